/**
 * vetkit
 *
 * Validation and classification of loosely-typed input.
 *
 * Import from subpath exports:
 *   import { validateIdentityNumber } from "vetkit/validation";
 *   import { configureValidatorLogging } from "vetkit/logging";
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0'

export * from './errors/index.ts'
export * from './validation/index.ts'
