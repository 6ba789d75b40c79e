/**
 * Structured validation errors.
 *
 * The predicates in `validation/` report failure as a boolean or a
 * `ValidationResult`. The `assert*` helpers throw a `ValidationError`
 * instead, carrying the same classification:
 * - Machine-readable kind and code
 * - Context metadata for debugging
 * - Error chaining via `cause`
 * - JSON serialization for logging/transport
 *
 * @module errors/validation-error
 */

/**
 * Failure classes for rejected input.
 *
 * - FORMAT: wrong length, disallowed characters, malformed grammar, undecodable text
 * - SEMANTIC: well-formed but invalid content (unknown region, future birthdate)
 * - INTEGRITY: checksum or verification digit mismatch
 */
export type ValidationErrorKind = 'FORMAT' | 'SEMANTIC' | 'INTEGRITY'

/**
 * Machine-readable failure codes.
 */
export type ValidationErrorCode =
	| 'EMPTY_INPUT'
	| 'MALFORMED'
	| 'INVALID_OPTIONS'
	| 'UNKNOWN_REGION'
	| 'INVALID_BIRTHDATE'
	| 'FUTURE_BIRTHDATE'
	| 'CHECKSUM_MISMATCH'

/**
 * Kind and code of a single rejection.
 */
export interface ValidationIssue {
	kind: ValidationErrorKind
	code: ValidationErrorCode
}

/**
 * Error thrown when input is rejected by an asserting validator.
 *
 * @example
 * ```typescript
 * throw new ValidationError(
 *   "Unknown region code: 00",
 *   { kind: "SEMANTIC", code: "UNKNOWN_REGION" },
 *   { region: "00" },
 * );
 * ```
 */
export class ValidationError extends Error {
	public readonly kind: ValidationErrorKind

	public readonly code: ValidationErrorCode

	/**
	 * Arbitrary context metadata for debugging.
	 */
	public readonly context: Record<string, unknown>

	/**
	 * Original error that caused this error (for error chaining).
	 */
	public override readonly cause?: Error

	constructor(
		message: string,
		issue: ValidationIssue,
		context: Record<string, unknown> = {},
		cause?: Error,
	) {
		super(message)
		this.name = 'ValidationError'
		this.kind = issue.kind
		this.code = issue.code
		this.context = context
		this.cause = cause

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, ValidationError)
		}
	}

	/**
	 * Serialize error to JSON for logging or transport.
	 */
	toJSON(): {
		name: string
		message: string
		kind: ValidationErrorKind
		code: ValidationErrorCode
		context: Record<string, unknown>
		stack?: string
		cause?: {
			name: string
			message: string
			stack?: string
		}
	} {
		return {
			name: this.name,
			message: this.message,
			kind: this.kind,
			code: this.code,
			context: this.context,
			stack: this.stack,
			cause: this.cause
				? {
						name: this.cause.name,
						message: this.cause.message,
						stack: this.cause.stack,
					}
				: undefined,
		}
	}
}

/**
 * Type guard to check if an error is a ValidationError.
 *
 * @param error - Value to check
 * @returns True if error is a ValidationError instance
 */
export function isValidationError(error: unknown): error is ValidationError {
	return error instanceof ValidationError
}
