/**
 * Validator logger setup.
 *
 * Library code only ever calls `getValidatorLogger()`; LogTape drops
 * records until a host application configures sinks. Hosts opt in with
 * `configureValidatorLogging()`:
 * - Console output by default
 * - JSONL file output with rotation when `logFile` is given
 * - Extra caller-supplied sinks (e.g. an in-memory buffer in tests)
 */

import { existsSync, mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import { getRotatingFileSink } from '@logtape/file'
import {
	configure,
	getConsoleSink,
	getLogger,
	jsonLinesFormatter,
	type Logger,
	reset,
	type Sink,
} from '@logtape/logtape'
import {
	DEFAULT_LOG_LEVEL,
	DEFAULT_ROTATION,
	LOG_CATEGORY,
	type LogLevel,
	type LogRotation,
} from './config.ts'

/**
 * Options for configuring validator logging.
 */
export interface ValidatorLoggingOptions {
	/**
	 * Lowest log level to capture. Defaults to "info".
	 * Rejection reasons are logged at "debug".
	 */
	lowestLevel?: LogLevel

	/**
	 * Path of a JSONL log file. When set, records go to a rotating file
	 * instead of the console.
	 */
	logFile?: string

	/**
	 * Rotation of the log file. Defaults to 1 MiB per file, 5 files kept.
	 */
	rotation?: Partial<LogRotation>

	/**
	 * Additional named sinks that receive every validator record.
	 */
	sinks?: Record<string, Sink>
}

let isConfigured = false

/**
 * Configure LogTape sinks for validator records.
 *
 * Safe to call multiple times - only configures once. Also safe to call
 * when the host has already configured LogTape itself.
 *
 * @param options - Sink and level options
 *
 * @example
 * ```typescript
 * import { configureValidatorLogging } from "vetkit/logging";
 *
 * await configureValidatorLogging({ lowestLevel: "debug" });
 * ```
 */
export async function configureValidatorLogging(
	options: ValidatorLoggingOptions = {},
): Promise<void> {
	if (isConfigured) return

	const {
		lowestLevel = DEFAULT_LOG_LEVEL,
		logFile,
		rotation,
		sinks: extraSinks = {},
	} = options

	const sinks: Record<string, Sink> = { ...extraSinks }
	if (logFile) {
		const logDir = dirname(logFile)
		if (!existsSync(logDir)) {
			mkdirSync(logDir, { recursive: true })
		}
		sinks[`file_${LOG_CATEGORY}`] = getRotatingFileSink(logFile, {
			formatter: jsonLinesFormatter,
			...DEFAULT_ROTATION,
			...rotation,
		})
	} else if (Object.keys(extraSinks).length === 0) {
		sinks[`console_${LOG_CATEGORY}`] = getConsoleSink()
	}
	const sinkNames = Object.keys(sinks)

	try {
		await configure({
			sinks,
			loggers: [
				{ category: [LOG_CATEGORY], sinks: sinkNames, lowestLevel },
				{ category: ['logtape', 'meta'], sinks: sinkNames, lowestLevel: 'error' },
			],
		})
	} catch (error: unknown) {
		// The host configured LogTape first; keep its configuration.
		if (error instanceof Error && error.message.includes('Already configured')) {
			isConfigured = true
			return
		}
		throw error
	}

	isConfigured = true
	getLogger([LOG_CATEGORY]).info('Logging initialized', {
		lowestLevel,
		logFile,
		sinks: sinkNames,
	})
}

/**
 * Tear down the LogTape configuration made by `configureValidatorLogging()`.
 */
export async function resetValidatorLogging(): Promise<void> {
	await reset()
	isConfigured = false
}

/**
 * Get the logger for a validator subsystem.
 *
 * @param subsystem - Subsystem name (e.g., "identity", "keys")
 * @returns Logger for the ["vetkit", subsystem] category
 */
export function getValidatorLogger(subsystem: string): Logger {
	return getLogger([LOG_CATEGORY, subsystem])
}
