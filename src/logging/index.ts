/**
 * vetkit/logging
 *
 * LogTape-based logging for the validators. Records are dropped until the
 * host application opts in.
 *
 * @example
 * ```typescript
 * import { configureValidatorLogging } from "vetkit/logging";
 *
 * // At the application entry point
 * await configureValidatorLogging({ lowestLevel: "debug" });
 * ```
 *
 * @packageDocumentation
 */

export {
	DEFAULT_LOG_LEVEL,
	DEFAULT_ROTATION,
	isLogLevel,
	LOG_CATEGORY,
	LOG_LEVELS,
	type LogLevel,
	type LogRotation,
} from './config.ts'
export {
	configureValidatorLogging,
	getValidatorLogger,
	resetValidatorLogging,
	type ValidatorLoggingOptions,
} from './factory.ts'
