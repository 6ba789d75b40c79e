/**
 * Validators for loosely-typed input.
 *
 * - Flexible date/time parsing into signed Unix timestamps
 * - Resident identity numbers (region, birthdate, checksum, 15→18 upgrade)
 * - RSA public key structure and modulus size
 * - Emptiness and nilness of arbitrary runtime values
 *
 * @module validation
 */

export {
	resolveValidatorOptions,
	type TimeZone,
	type ValidatorOptions,
	type ValidatorOptionsInput,
	validatorOptionsSchema,
} from './config.ts'
export { isDateTime, type NormalizedDate, normalizeDate, parseDate } from './dates.ts'
export {
	assertIdentityNumber,
	type IdentityOptions,
	identityChecksum,
	isIdentityNumber,
	validateIdentityNumber,
} from './identity.ts'
export {
	classifyValue,
	isBool,
	isComposite,
	isEmpty,
	isEmptyShape,
	isFloat,
	isInteger,
	isMapping,
	isNil,
	isNilShape,
	isNumeric,
	isSequence,
	isString,
	type ShapedValue,
	type ValueShape,
} from './introspect.ts'
export {
	isBase64,
	matchesPattern,
	PATTERNS,
	type PatternRule,
	type ValidationResult,
} from './patterns.ts'
export { inspectPublicKey, isRsaPublicKey, type PublicKeyInfo } from './public-key.ts'
export {
	createRegionTable,
	REGION_CODES,
	RegionCodeTable,
	regionOf,
} from './regions.ts'
