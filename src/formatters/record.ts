/**
 * Helpers shared by the record formatters.
 *
 * @module formatters/record
 */

import type { LogLevel, LogRecord } from '@logtape/logtape'

/** Property keys rendered as correlation labels rather than plain context */
export const CORRELATION_KEYS = ['user_id', 'session_id', 'request_id'] as const

/**
 * Upper-case level label (e.g., "WARNING").
 */
export function levelLabel(level: LogLevel): string {
	return level.toUpperCase()
}

/**
 * Dotted logger name for a category; `root` for the empty category.
 */
export function loggerName(record: LogRecord): string {
	return record.category.join('.') || 'root'
}

/**
 * JSON.stringify replacer that keeps errors and bigints readable.
 */
export function jsonReplacer(_key: string, value: unknown): unknown {
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack }
	}
	if (typeof value === 'bigint') {
		return value.toString()
	}
	return value
}

/**
 * Render a property value for a single-line text log.
 */
export function formatValue(value: unknown): string {
	if (typeof value === 'string') return value
	if (value instanceof Error) return `${value.name}: ${value.message}`
	if (value !== null && typeof value === 'object') {
		return JSON.stringify(value, jsonReplacer)
	}
	return String(value)
}

/**
 * Join LogTape's interleaved message parts into one string.
 *
 * Even indexes hold literal text, odd indexes hold interpolated values.
 */
export function renderMessage(record: LogRecord): string {
	return record.message
		.map((part, index) =>
			index % 2 === 0 ? String(part) : formatValue(part),
		)
		.join('')
}

/**
 * Exception text for an `error` property, when it holds an Error.
 */
export function exceptionText(value: unknown): string | undefined {
	if (!(value instanceof Error)) return undefined
	return value.stack ?? `${value.name}: ${value.message}`
}
