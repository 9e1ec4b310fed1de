/**
 * Single-line text formatters.
 *
 * Line shape:
 * `2025-01-02T03:04:05.678Z - app.db - INFO - Connected [user=u1 request=r9 pool=4]`
 *
 * @module formatters/text
 */

import type { LogLevel, LogRecord, TextFormatter } from '@logtape/logtape'
import {
	CORRELATION_KEYS,
	formatValue,
	levelLabel,
	loggerName,
	renderMessage,
} from './record.ts'

export interface TextFormatterOptions {
	/** Prefix each line with the ISO-8601 timestamp. Defaults to true. */
	includeTimestamp?: boolean
	/** Include the dotted logger category. Defaults to true. */
	includeLoggerName?: boolean
	/** Append record properties as a `[key=value ...]` suffix. Defaults to true. */
	includeContext?: boolean
}

const CORRELATION_LABELS: Record<(typeof CORRELATION_KEYS)[number], string> = {
	user_id: 'user',
	session_id: 'session',
	request_id: 'request',
}

const ANSI_RESET = '\x1b[0m'

const LEVEL_COLORS: Record<LogLevel, string> = {
	trace: '\x1b[36m',
	debug: '\x1b[36m',
	info: '\x1b[32m',
	warning: '\x1b[33m',
	error: '\x1b[31m',
	fatal: '\x1b[35m',
}

/**
 * Render record properties as ` [user=… session=… request=… key=value …]`.
 *
 * Correlation IDs come first under short labels; the remaining properties
 * follow in insertion order. Returns an empty string when nothing is left.
 */
export function formatContextSuffix(properties: Record<string, unknown>): string {
	const parts: string[] = []

	for (const key of CORRELATION_KEYS) {
		const value = properties[key]
		if (value !== undefined && value !== null && value !== '') {
			parts.push(`${CORRELATION_LABELS[key]}=${formatValue(value)}`)
		}
	}

	const correlationKeys: ReadonlySet<string> = new Set(CORRELATION_KEYS)
	for (const [key, value] of Object.entries(properties)) {
		if (correlationKeys.has(key) || value === undefined) continue
		parts.push(`${key}=${formatValue(value)}`)
	}

	return parts.length > 0 ? ` [${parts.join(' ')}]` : ''
}

function createLineFormatter(
	options: TextFormatterOptions,
	renderLevel: (level: LogLevel) => string,
): TextFormatter {
	const {
		includeTimestamp = true,
		includeLoggerName = true,
		includeContext = true,
	} = options

	return (record: LogRecord): string => {
		const segments: string[] = []
		if (includeTimestamp) {
			segments.push(new Date(record.timestamp).toISOString())
		}
		if (includeLoggerName) {
			segments.push(loggerName(record))
		}
		segments.push(renderLevel(record.level), renderMessage(record))

		const suffix = includeContext ? formatContextSuffix(record.properties) : ''
		return `${segments.join(' - ')}${suffix}\n`
	}
}

/**
 * Plain text formatter for files and non-interactive streams.
 *
 * @example
 * ```typescript
 * const formatter = createTextFormatter({ includeTimestamp: false });
 * // "app - INFO - Started [port=8080]\n"
 * ```
 */
export function createTextFormatter(
	options: TextFormatterOptions = {},
): TextFormatter {
	return createLineFormatter(options, levelLabel)
}

/**
 * Text formatter with the level label wrapped in an ANSI colour.
 */
export function createColoredFormatter(
	options: TextFormatterOptions = {},
): TextFormatter {
	return createLineFormatter(
		options,
		(level) => `${LEVEL_COLORS[level]}${levelLabel(level)}${ANSI_RESET}`,
	)
}
