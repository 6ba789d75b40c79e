/**
 * Validator logging defaults.
 */

/** Root category for every validator logger */
export const LOG_CATEGORY = 'vetkit'

/**
 * Levels a host may choose as the lowest captured level. Validators log
 * rejection reasons at "debug" and lifecycle events at "info"; LogTape
 * spells the third level "warning".
 */
export const LOG_LEVELS = ['debug', 'info', 'warning', 'error'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

/** Lowest level captured when the host does not choose one */
export const DEFAULT_LOG_LEVEL: LogLevel = 'info'

/** Size-based rotation of the JSONL log file */
export interface LogRotation {
	/** Bytes written before the file rotates */
	maxSize: number
	/** Rotated files kept beside the active one */
	maxFiles: number
}

export const DEFAULT_ROTATION: Readonly<LogRotation> = Object.freeze({
	maxSize: 1024 * 1024,
	maxFiles: 5,
})

/**
 * Type guard for level names read from untyped configuration.
 *
 * @example
 * ```typescript
 * isLogLevel(process.env.VETKIT_LOG_LEVEL) // "warn" => false
 * ```
 */
export function isLogLevel(value: unknown): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value)
}
