/**
 * Error handling utilities.
 *
 * @module errors
 */

export {
	isValidationError,
	ValidationError,
	type ValidationErrorCode,
	type ValidationErrorKind,
	type ValidationIssue,
} from './validation-error.ts'
