/**
 * JSON Lines formatters.
 *
 * @module formatters/json
 */

import type { LogRecord, TextFormatter } from '@logtape/logtape'
import {
	exceptionText,
	jsonReplacer,
	levelLabel,
	loggerName,
	renderMessage,
} from './record.ts'

export interface JsonFormatterOptions {
	/** Lift properties to the top level instead of nesting them under `extra`. */
	flatten?: boolean
	/** Include record properties at all. Defaults to true. */
	includeExtra?: boolean
}

function splitError(properties: Record<string, unknown>): {
	exception: string | undefined
	rest: Record<string, unknown>
} {
	const { error, ...rest } = properties
	const exception = exceptionText(error)
	if (exception === undefined && error !== undefined) {
		return { exception, rest: { ...rest, error } }
	}
	return { exception, rest }
}

/**
 * One JSON object per line:
 * `{"timestamp","level","logger","message","exception"?,"extra"?}`.
 *
 * An `error` property holding an Error becomes `exception` (its stack).
 */
export function createJsonFormatter(
	options: JsonFormatterOptions = {},
): TextFormatter {
	const { flatten = false, includeExtra = true } = options

	return (record: LogRecord): string => {
		const data: Record<string, unknown> = {
			timestamp: new Date(record.timestamp).toISOString(),
			level: levelLabel(record.level),
			logger: loggerName(record),
			message: renderMessage(record),
		}

		const { exception, rest } = splitError(record.properties)
		if (exception !== undefined) {
			data.exception = exception
		}

		if (includeExtra && Object.keys(rest).length > 0) {
			if (flatten) {
				Object.assign(data, rest)
			} else {
				data.extra = rest
			}
		}

		return `${JSON.stringify(data, jsonReplacer)}\n`
	}
}

/**
 * Fixed-shape JSON entry with correlation IDs lifted out of the properties:
 * `{timestamp, level, logger, message, exception, context, user_id, session_id, request_id}`.
 * Absent fields are `null`.
 */
export function createStructuredFormatter(): TextFormatter {
	return (record: LogRecord): string => {
		const { exception, rest } = splitError(record.properties)
		const { user_id, session_id, request_id, ...context } = rest

		const entry = {
			timestamp: new Date(record.timestamp).toISOString(),
			level: levelLabel(record.level),
			logger: loggerName(record),
			message: renderMessage(record),
			exception: exception ?? null,
			context,
			user_id: user_id ?? null,
			session_id: session_id ?? null,
			request_id: request_id ?? null,
		}

		return `${JSON.stringify(entry, jsonReplacer)}\n`
	}
}
