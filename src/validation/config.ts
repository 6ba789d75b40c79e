/**
 * Validator options.
 *
 * @module validation/config
 */

import { z } from 'zod'
import { ValidationError } from '../errors/index.ts'

/**
 * Schema for options shared by the date-aware validators.
 */
export const validatorOptionsSchema = z
	.object({
		/** Zone used to turn calendar fields into a timestamp */
		timeZone: z.enum(['local', 'utc']).default('local'),
	})
	.strict()

/** Options as callers pass them */
export type ValidatorOptionsInput = z.input<typeof validatorOptionsSchema>

/** Options with defaults applied */
export type ValidatorOptions = z.output<typeof validatorOptionsSchema>

/** Zone used to turn calendar fields into a timestamp */
export type TimeZone = ValidatorOptions['timeZone']

/**
 * Parse caller options and apply defaults.
 *
 * @param input - Raw options (may be undefined)
 * @returns Options with defaults applied
 * @throws ValidationError (FORMAT / INVALID_OPTIONS) if an option is unknown or malformed
 *
 * @example
 * ```typescript
 * resolveValidatorOptions() // => { timeZone: "local" }
 * resolveValidatorOptions({ timeZone: "utc" }) // => { timeZone: "utc" }
 * ```
 */
export function resolveValidatorOptions(
	input: ValidatorOptionsInput = {},
): ValidatorOptions {
	const result = validatorOptionsSchema.safeParse(input)
	if (!result.success) {
		const detail = result.error.issues
			.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
			.join('; ')
		throw new ValidationError(
			`Invalid validator options: ${detail}`,
			{ kind: 'FORMAT', code: 'INVALID_OPTIONS' },
			{ input },
			result.error,
		)
	}
	return result.data
}
