/**
 * Named pattern rules shared by the validators.
 *
 * Format checks that are pure regular expressions live here, so the
 * validators that consume them can ask for a rule by name.
 *
 * @module validation/patterns
 */

import type { ValidationIssue } from '../errors/index.ts'

/**
 * Validation result with success status, validated value, and optional error.
 */
export interface ValidationResult<T = string> {
	/** Whether validation passed */
	valid: boolean
	/** Validated value (only present if valid) */
	value?: T
	/** Error message (only present if invalid) */
	error?: string
	/** Failure classification (only present if invalid) */
	issue?: ValidationIssue
}

/**
 * Rule table.
 *
 * - identityNumber: 15 digits, or 17 digits followed by a digit or X/x
 * - dateTime: `YYYY`, `YYYY-MM`, `YYYY-MM-DD`, then ` HH`, `:MM`, `:SS`
 * - base64: standard alphabet with padding
 * - integer: optionally signed decimal digits
 * - decimal: optionally signed digits with an optional fraction (no exponent)
 */
export const PATTERNS = {
	identityNumber: /^(\d{15}|\d{17}[0-9Xx])$/,
	dateTime: /^\d{4}(-\d{2}(-\d{2}( \d{2}(:\d{2}(:\d{2})?)?)?)?)?$/,
	base64: /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/,
	integer: /^[-+]?\d+$/,
	decimal: /^[-+]?(\d+(\.\d*)?|\.\d+)$/,
} as const satisfies Record<string, RegExp>

/** Name of a rule in {@link PATTERNS} */
export type PatternRule = keyof typeof PATTERNS

/**
 * Check input against a named rule. Empty input never matches.
 *
 * @param rule - Rule name
 * @param input - Text to check
 * @returns True if the whole input matches the rule
 *
 * @example
 * ```typescript
 * matchesPattern("identityNumber", "11010519491231002X") // => true
 * matchesPattern("dateTime", "2024-03") // => true
 * matchesPattern("dateTime", "") // => false
 * ```
 */
export function matchesPattern(rule: PatternRule, input: string): boolean {
	return input !== '' && PATTERNS[rule].test(input)
}

/**
 * Check if text is padded standard base64.
 */
export function isBase64(text: string): boolean {
	return matchesPattern('base64', text)
}
