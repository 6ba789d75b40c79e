/**
 * Flexible date/time parsing.
 *
 * Accepts partial dates (`2024`, `2024-03`, `2024/03/05 10:30`, ...) and
 * completes them to the canonical `YYYY-MM-DD HH:MM:SS` form before
 * converting to a signed Unix timestamp. Dates before 1970 give negative
 * timestamps.
 *
 * @module validation/dates
 */

import {
	resolveValidatorOptions,
	type TimeZone,
	type ValidatorOptionsInput,
} from './config.ts'
import { matchesPattern, type ValidationResult } from './patterns.ts'

/** Fills the fields a partial date leaves out */
const REFERENCE_DATE_TIME = '1970-01-01 00:00:00'

/**
 * A date/time completed to canonical form.
 */
export interface NormalizedDate {
	/** Canonical `YYYY-MM-DD HH:MM:SS` text */
	text: string
	date: Date
	/** Seconds since the Unix epoch (negative before 1970) */
	timestamp: number
}

/**
 * Complete partial date text and convert it to a timestamp.
 *
 * @param text - Date text using `-` or `/` as the date separator
 * @param options - Time zone for the conversion (default: local)
 * @returns Normalized date, or null if the text is not a valid date
 * @throws ValidationError (FORMAT, INVALID_OPTIONS) if the options are invalid
 *
 * @example
 * ```typescript
 * normalizeDate("2024/03", { timeZone: "utc" })
 * // => { text: "2024-03-01 00:00:00", date: ..., timestamp: 1709251200 }
 *
 * normalizeDate("2024-02-30") // => null
 * ```
 */
export function normalizeDate(
	text: string,
	options?: ValidatorOptionsInput,
): NormalizedDate | null {
	const { timeZone } = resolveValidatorOptions(options)
	if (text === '') return null

	const dashed = text.replaceAll('/', '-')
	if (!matchesPattern('dateTime', dashed)) return null

	const canonical = dashed + REFERENCE_DATE_TIME.slice(dashed.length)
	const date = toCalendarDate(canonical, timeZone)
	if (!date) return null

	return { text: canonical, date, timestamp: date.getTime() / 1000 }
}

/**
 * Parse date text into a Unix timestamp in seconds.
 *
 * Malformed text is reported as `{ valid: false }`, never thrown.
 *
 * @param text - Date text using `-` or `/` as the date separator
 * @param options - Time zone for the conversion (default: local)
 * @returns Validation result with the timestamp
 * @throws ValidationError (FORMAT, INVALID_OPTIONS) if the options are invalid
 *
 * @example
 * ```typescript
 * parseDate("2024-03-05", { timeZone: "utc" })
 * // => { valid: true, value: 1709596800 }
 *
 * parseDate("2024-13-01")
 * // => { valid: false, error: "Invalid date: 2024-13-01", issue: {...} }
 * ```
 */
export function parseDate(
	text: string,
	options?: ValidatorOptionsInput,
): ValidationResult<number> {
	const normalized = normalizeDate(text, options)
	if (!normalized) {
		return {
			valid: false,
			error: text === '' ? 'Date cannot be empty' : `Invalid date: ${text}`,
			issue: { kind: 'FORMAT', code: text === '' ? 'EMPTY_INPUT' : 'MALFORMED' },
		}
	}
	return { valid: true, value: normalized.timestamp }
}

/**
 * Check if text is a valid (possibly partial) date.
 *
 * @throws ValidationError if the options are invalid
 */
export function isDateTime(text: string, options?: ValidatorOptionsInput): boolean {
	return normalizeDate(text, options) !== null
}

function isLeapYear(year: number): boolean {
	return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

function daysInMonth(year: number, month: number): number {
	if (month === 2) return isLeapYear(year) ? 29 : 28
	return [4, 6, 9, 11].includes(month) ? 30 : 31
}

/**
 * Convert canonical `YYYY-MM-DD HH:MM:SS` text to a Date, rejecting
 * out-of-range fields instead of rolling them over.
 */
function toCalendarDate(canonical: string, timeZone: TimeZone): Date | null {
	const year = Number(canonical.slice(0, 4))
	const month = Number(canonical.slice(5, 7))
	const day = Number(canonical.slice(8, 10))
	const hour = Number(canonical.slice(11, 13))
	const minute = Number(canonical.slice(14, 16))
	const second = Number(canonical.slice(17, 19))

	if (month < 1 || month > 12) return null
	if (day < 1 || day > daysInMonth(year, month)) return null
	if (hour > 23 || minute > 59 || second > 59) return null

	// setFullYear keeps years 0-99 literal, unlike the Date constructor.
	const date = new Date(0)
	if (timeZone === 'utc') {
		date.setUTCFullYear(year, month - 1, day)
		date.setUTCHours(hour, minute, second, 0)
	} else {
		date.setFullYear(year, month - 1, day)
		date.setHours(hour, minute, second, 0)
	}
	return date
}
