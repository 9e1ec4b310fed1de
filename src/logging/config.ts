/**
 * Logging defaults shared by the configuration schemas and the sink factories.
 */

/** Maximum log file size before rotation (10 MiB) */
export const DEFAULT_MAX_SIZE: number = 10 * 0x400 * 0x400

/** Number of rotated files to keep */
export const DEFAULT_MAX_FILES = 5

/** Default log file extension */
export const DEFAULT_LOG_EXTENSION = '.log'

/** Logger name used when a configuration does not name one */
export const DEFAULT_LOGGER_NAME = 'tracelight'

/**
 * Levels understood by LogTape, most verbose first.
 *
 * Note: LogTape uses "warning" not "warn", and "fatal" where other
 * runtimes say "critical".
 */
export const LOG_LEVELS = [
	'trace',
	'debug',
	'info',
	'warning',
	'error',
	'fatal',
] as const

/**
 * - TRACE/DEBUG: Diagnostic detail
 * - INFO: Normal operation events (requests served, slow operations, training steps)
 * - WARNING: Degraded operation (4xx responses, sink failures)
 * - ERROR: Operation failures (5xx responses, exceptions)
 * - FATAL: The process cannot continue
 */
export type LogLevel = (typeof LOG_LEVELS)[number]

/** Default lowest log level to capture */
export const DEFAULT_LOG_LEVEL: LogLevel = 'info'

/** Output formats a handler can be configured with */
export const LOG_FORMATS = ['text', 'json', 'structured'] as const

export type LogFormat = (typeof LOG_FORMATS)[number]

/**
 * Returns the more verbose of two levels.
 */
export function mostVerboseLevel(a: LogLevel, b: LogLevel): LogLevel {
	return LOG_LEVELS.indexOf(a) <= LOG_LEVELS.indexOf(b) ? a : b
}

/** Category for this package's own diagnostics (e.g., failed emissions) */
export const META_CATEGORY: readonly string[] = [DEFAULT_LOGGER_NAME, 'meta']

/** LogTape's own diagnostics category */
export const LOGTAPE_META_CATEGORY: readonly string[] = ['logtape', 'meta']
