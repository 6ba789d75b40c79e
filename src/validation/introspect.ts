/**
 * Runtime value introspection.
 *
 * Classifies an arbitrary value into a closed set of shapes, then answers
 * "is it nil?" and "is it empty?" over the classified variant. Used as a
 * guard before the other validators see a value.
 *
 * @module validation/introspect
 */

import { matchesPattern } from './patterns.ts'

/**
 * Kind of a runtime value. `absent` is `null` or `undefined`.
 */
export type ValueShape = ShapedValue['shape']

/**
 * A value narrowed to its shape.
 *
 * - ordered-sequence: arrays, typed arrays, DataView, ArrayBuffer (length in elements or bytes)
 * - unordered-mapping: Map and Set
 * - signed-integer: integral numbers and negative bigints
 * - unsigned-integer: non-negative bigints
 * - floating-point: every other number, NaN and Infinity included
 * - pointer-like: WeakRef (referent may be gone), functions and symbols
 * - other-composite: every other object
 */
export type ShapedValue =
	| { shape: 'absent'; value: null | undefined }
	| { shape: 'text'; value: string }
	| { shape: 'ordered-sequence'; length: number }
	| { shape: 'unordered-mapping'; size: number }
	| { shape: 'boolean'; value: boolean }
	| { shape: 'signed-integer'; value: number | bigint }
	| { shape: 'unsigned-integer'; value: bigint }
	| { shape: 'floating-point'; value: number }
	| { shape: 'pointer-like'; referent: unknown }
	| { shape: 'other-composite'; value: object }

/**
 * Classify a value by its runtime kind.
 *
 * @param value - Any value
 * @returns The tagged variant for the value
 *
 * @example
 * ```typescript
 * classifyValue("") // => { shape: "text", value: "" }
 * classifyValue([1, 2]) // => { shape: "ordered-sequence", length: 2 }
 * classifyValue(5n) // => { shape: "unsigned-integer", value: 5n }
 * ```
 */
export function classifyValue(value: unknown): ShapedValue {
	switch (typeof value) {
		case 'undefined':
			return { shape: 'absent', value }
		case 'object':
			return value === null ? { shape: 'absent', value } : classifyObject(value)
		case 'string':
			return { shape: 'text', value }
		case 'boolean':
			return { shape: 'boolean', value }
		case 'number':
			return Number.isInteger(value)
				? { shape: 'signed-integer', value }
				: { shape: 'floating-point', value }
		case 'bigint':
			return value < 0n
				? { shape: 'signed-integer', value }
				: { shape: 'unsigned-integer', value }
		default:
			// functions and symbols
			return { shape: 'pointer-like', referent: value }
	}
}

// Revoked proxies throw from Array.isArray and instanceof; such values
// stay opaque composites.
function classifyObject(value: object): ShapedValue {
	try {
		return classifyKnownObject(value)
	} catch {
		return { shape: 'other-composite', value }
	}
}

function classifyKnownObject(value: object): ShapedValue {
	if (Array.isArray(value)) {
		return { shape: 'ordered-sequence', length: value.length }
	}
	if (ArrayBuffer.isView(value) || value instanceof ArrayBuffer) {
		return { shape: 'ordered-sequence', length: value.byteLength }
	}
	if (value instanceof Map || value instanceof Set) {
		return { shape: 'unordered-mapping', size: value.size }
	}
	if (value instanceof WeakRef) {
		return { shape: 'pointer-like', referent: value.deref() }
	}
	return { shape: 'other-composite', value }
}

/**
 * Whether a classified value is nil: absent, or a pointer-like value whose
 * referent is gone. Primitives and composites are never nil.
 */
export function isNilShape(shaped: ShapedValue): boolean {
	switch (shaped.shape) {
		case 'absent':
			return true
		case 'pointer-like':
			return shaped.referent === undefined
		default:
			return false
	}
}

/**
 * Whether a classified value is empty.
 *
 * Text, sequences and mappings are empty at length zero; booleans when
 * false; numbers when zero; pointer-like values when their referent is
 * gone. Other composites are empty when they equal their zero value: a
 * plain object whose own fields are all empty, or an invalid Date.
 */
export function isEmptyShape(shaped: ShapedValue): boolean {
	return emptyShape(shaped, new Set())
}

/**
 * Check if a value is `null`/`undefined` or a dead reference.
 *
 * @example
 * ```typescript
 * isNil(null) // => true
 * isNil(0) // => false
 * isNil(new WeakRef({})) // => false while the target is alive
 * ```
 */
export function isNil(value: unknown): boolean {
	return isNilShape(classifyValue(value))
}

/**
 * Check if a value is empty for its kind.
 *
 * @example
 * ```typescript
 * isEmpty("") // => true
 * isEmpty("a") // => false
 * isEmpty(0) // => true
 * isEmpty([]) // => true
 * isEmpty({ name: "", tags: [] }) // => true
 * ```
 */
export function isEmpty(value: unknown): boolean {
	return isEmptyShape(classifyValue(value))
}

function emptyShape(shaped: ShapedValue, path: Set<object>): boolean {
	switch (shaped.shape) {
		case 'absent':
			return true
		case 'text':
			return shaped.value.length === 0
		case 'ordered-sequence':
			return shaped.length === 0
		case 'unordered-mapping':
			return shaped.size === 0
		case 'boolean':
			return !shaped.value
		case 'signed-integer':
			return shaped.value === 0 || shaped.value === 0n
		case 'unsigned-integer':
			return shaped.value === 0n
		case 'floating-point':
			return shaped.value === 0
		case 'pointer-like':
			return shaped.referent === undefined
		case 'other-composite':
			return isZeroComposite(shaped.value, path)
	}
}

function isZeroComposite(value: object, path: Set<object>): boolean {
	// A field pointing back up the path is a live reference.
	if (path.has(value)) return false

	let proto: unknown
	let fields: unknown[]
	try {
		if (value instanceof Date) {
			return Number.isNaN(value.getTime())
		}
		proto = Object.getPrototypeOf(value)
		fields = Object.values(value)
	} catch {
		// Throwing getters and revoked proxies cannot be read, so they are not zero.
		return false
	}
	// Objects with only internal state (RegExp, Promise, URL, ...) are never zero.
	if (fields.length === 0) {
		return proto === Object.prototype || proto === null
	}

	path.add(value)
	const zero = fields.every((field) => emptyShape(classifyValue(field), path))
	path.delete(value)
	return zero
}

// ============================================================================
// Kind predicates
// ============================================================================

/** Check if a value is a string. */
export function isString(value: unknown): value is string {
	return classifyValue(value).shape === 'text'
}

/** Check if a value is a boolean. */
export function isBool(value: unknown): value is boolean {
	return classifyValue(value).shape === 'boolean'
}

/**
 * Check if a value is an ordered sequence: an array, typed array,
 * DataView or ArrayBuffer.
 */
export function isSequence(value: unknown): boolean {
	return classifyValue(value).shape === 'ordered-sequence'
}

/** Check if a value is a Map or Set. */
export function isMapping(value: unknown): value is Map<unknown, unknown> | Set<unknown> {
	return classifyValue(value).shape === 'unordered-mapping'
}

/**
 * Check if a value is a composite object: an object that is not a
 * sequence, mapping or reference.
 *
 * @example
 * ```typescript
 * isComposite({ a: 1 }) // => true
 * isComposite(new Date()) // => true
 * isComposite([1]) // => false
 * isComposite(new Map()) // => false
 * ```
 */
export function isComposite(value: unknown): value is object {
	return classifyValue(value).shape === 'other-composite'
}

/**
 * Check if a value is an integer: an integral number, a bigint, or a
 * string of optionally signed digits.
 *
 * @example
 * ```typescript
 * isInteger(42) // => true
 * isInteger("-17") // => true
 * isInteger(1.5) // => false
 * isInteger("1e3") // => false
 * ```
 */
export function isInteger(value: unknown): boolean {
	const shaped = classifyValue(value)
	switch (shaped.shape) {
		case 'signed-integer':
		case 'unsigned-integer':
			return true
		case 'text':
			return matchesPattern('integer', shaped.value)
		default:
			return false
	}
}

/**
 * Check if a value is a fractional number: a finite non-integral number,
 * or a decimal string containing a point.
 *
 * @example
 * ```typescript
 * isFloat(1.5) // => true
 * isFloat("3.14") // => true
 * isFloat(2) // => false
 * isFloat(Number.NaN) // => false
 * ```
 */
export function isFloat(value: unknown): boolean {
	const shaped = classifyValue(value)
	switch (shaped.shape) {
		case 'floating-point':
			return Number.isFinite(shaped.value)
		case 'text':
			return shaped.value.includes('.') && matchesPattern('decimal', shaped.value)
		default:
			return false
	}
}

/**
 * Check if a value is numeric: a finite number, a bigint, or a decimal
 * string. Exponent notation is not numeric.
 *
 * @example
 * ```typescript
 * isNumeric("-12.5") // => true
 * isNumeric(".5") // => true
 * isNumeric("1e3") // => false
 * isNumeric(Number.POSITIVE_INFINITY) // => false
 * ```
 */
export function isNumeric(value: unknown): boolean {
	return isInteger(value) || isFloat(value)
}
