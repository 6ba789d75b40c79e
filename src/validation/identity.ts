/**
 * Resident identity number validation.
 *
 * An identity number is 18 characters: a 6-digit region code, an 8-digit
 * birthdate (`YYYYMMDD`), a 3-digit sequence number and a checksum
 * character (`0-9` or `X`). Legacy 15-digit numbers omit the century and
 * the checksum; they are upgraded to 18 characters, never returned as-is.
 *
 * Validation runs as one pipeline:
 *
 *   format -> region -> (upgrade legacy | keep full) -> birthdate -> checksum
 *
 * @module validation/identity
 */

import {
	ValidationError,
	type ValidationErrorCode,
	type ValidationErrorKind,
} from '../errors/index.ts'
import { getValidatorLogger } from '../logging/index.ts'
import type { TimeZone } from './config.ts'
import { parseDate } from './dates.ts'
import { matchesPattern, type ValidationResult } from './patterns.ts'
import { REGION_CODES, type RegionCodeTable, regionOf } from './regions.ts'

const logger = getValidatorLogger('identity')

/** Weight of digit i (1-indexed) is 2^(18 - i) mod 11 */
const CHECKSUM_WEIGHTS: readonly number[] = Array.from(
	{ length: 17 },
	(_, i) => 2 ** (17 - i) % 11,
)

/** Checksum character indexed by the weighted sum mod 11 */
const CHECKSUM_CHARS = '10X98765432'

/** Legacy sequence numbers reserved for people born in the 1800s */
const CENTENARIAN_SEQUENCES: ReadonlySet<string> = new Set(['996', '997', '998', '999'])

/**
 * Options for identity number validation.
 */
export interface IdentityOptions {
	/** Zone used to read the birthdate (default: local) */
	timeZone?: TimeZone
	/** Current time in milliseconds; birthdates must be strictly earlier (default: Date.now) */
	now?: () => number
	/** Region table to check the 2-digit prefix against (default: REGION_CODES) */
	regions?: RegionCodeTable
}

/**
 * Compute the checksum character for the first 17 digits of a number.
 *
 * @param digits - Text whose first 17 characters are digits
 * @returns Checksum character (`0-9` or `X`)
 * @throws ValidationError (FORMAT / MALFORMED) if the first 17 characters are not digits
 *
 * @example
 * ```typescript
 * identityChecksum("11010519491231002") // => "X"
 * identityChecksum("44030119850101123") // => "6"
 * ```
 */
export function identityChecksum(digits: string): string {
	const body = digits.slice(0, 17)
	if (!/^\d{17}$/.test(body)) {
		throw new ValidationError(
			`Checksum needs 17 leading digits (got: ${body})`,
			{ kind: 'FORMAT', code: 'MALFORMED' },
			{ length: digits.length },
		)
	}

	let sum = 0
	for (let i = 0; i < 17; i++) {
		sum += Number(body[i]) * CHECKSUM_WEIGHTS[i]
	}
	return CHECKSUM_CHARS.charAt(sum % 11)
}

/**
 * Upgrade a 15-digit legacy number to 18 characters: insert the century
 * after the region code and append the checksum.
 */
function upgradeLegacy(legacy: string): string {
	const century = CENTENARIAN_SEQUENCES.has(legacy.slice(12, 15)) ? '18' : '19'
	const body = legacy.slice(0, 6) + century + legacy.slice(6)
	return body + identityChecksum(body)
}

function rejected(
	kind: ValidationErrorKind,
	code: ValidationErrorCode,
	error: string,
): ValidationResult<string> {
	logger.debug('Identity number rejected', { kind, code })
	return { valid: false, error, issue: { kind, code } }
}

/**
 * Validate a 15- or 18-character identity number and return its canonical
 * 18-character form.
 *
 * Checks the format, the region code, the embedded birthdate (must parse
 * and be in the past) and, for 18-character input, the checksum. Legacy
 * 15-digit numbers are upgraded; a trailing `x` is upper-cased.
 *
 * @param text - Identity number
 * @param options - Clock, time zone and region table
 * @returns Validation result with the canonical number
 *
 * @example
 * ```typescript
 * validateIdentityNumber("440301850101123")
 * // => { valid: true, value: "440301198501011236" }
 *
 * validateIdentityNumber("11010519491231002x")
 * // => { valid: true, value: "11010519491231002X" }
 *
 * validateIdentityNumber("110105194912310021")
 * // => { valid: false, error: "Checksum mismatch: ...", issue: {...} }
 * ```
 */
export function validateIdentityNumber(
	text: string,
	options: IdentityOptions = {},
): ValidationResult<string> {
	const { timeZone = 'local', now = Date.now, regions = REGION_CODES } = options

	if (text === '') {
		return rejected('FORMAT', 'EMPTY_INPUT', 'Identity number cannot be empty')
	}
	if (!matchesPattern('identityNumber', text)) {
		return rejected(
			'FORMAT',
			'MALFORMED',
			'Identity number must be 15 digits, or 17 digits followed by a digit or X',
		)
	}
	if (regionOf(text, regions) === undefined) {
		return rejected('SEMANTIC', 'UNKNOWN_REGION', `Unknown region code: ${text.slice(0, 2)}`)
	}

	const isLegacy = text.length === 15
	const canonical = isLegacy ? upgradeLegacy(text) : text.toUpperCase()

	const birthdate = `${canonical.slice(6, 10)}-${canonical.slice(10, 12)}-${canonical.slice(12, 14)}`
	const born = parseDate(birthdate, { timeZone })
	if (!born.valid || born.value === undefined) {
		return rejected('SEMANTIC', 'INVALID_BIRTHDATE', `Invalid birthdate: ${birthdate}`)
	}
	if (born.value >= Math.floor(now() / 1000)) {
		return rejected('SEMANTIC', 'FUTURE_BIRTHDATE', `Birthdate is not in the past: ${birthdate}`)
	}

	if (!isLegacy) {
		const expected = identityChecksum(canonical)
		if (canonical.charAt(17) !== expected) {
			return rejected(
				'INTEGRITY',
				'CHECKSUM_MISMATCH',
				`Checksum mismatch: expected ${expected}, got ${canonical.charAt(17)}`,
			)
		}
	}

	return { valid: true, value: canonical }
}

/**
 * Check if text is a valid identity number.
 */
export function isIdentityNumber(text: string, options?: IdentityOptions): boolean {
	return validateIdentityNumber(text, options).valid
}

/**
 * Validate an identity number, throwing on failure.
 *
 * @param text - Identity number
 * @param options - Clock, time zone and region table
 * @returns Canonical 18-character number
 * @throws ValidationError carrying the failure kind and code
 *
 * @example
 * ```ts
 * assertIdentityNumber('440301850101123') // ✅ '440301198501011236'
 * assertIdentityNumber('000000000000000') // ❌ ValidationError: Unknown region code: 00
 * ```
 */
export function assertIdentityNumber(text: string, options?: IdentityOptions): string {
	const result = validateIdentityNumber(text, options)
	if (!result.valid || result.value === undefined) {
		throw new ValidationError(
			result.error ?? 'Invalid identity number',
			result.issue ?? { kind: 'FORMAT', code: 'MALFORMED' },
			{ length: text.length },
		)
	}
	return result.value
}
