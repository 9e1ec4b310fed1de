/**
 * HTTP request logging.
 *
 * One line per completed request, at a level chosen by status code:
 * `error` for 5xx, `warning` for 4xx, `info` otherwise.
 *
 * @example
 * ```typescript
 * const requests = new RequestLogger({ config: { logHeaders: true } });
 * requests.logRequest({
 *   method: "GET",
 *   path: "/users",
 *   statusCode: 200,
 *   duration: 0.042,
 *   headers: { accept: "application/json", authorization: "Bearer test-token" },
 * });
 * // INFO HTTP GET /users - 200 (0.042s) [... headers={"accept":"application/json"}]
 * ```
 *
 * @module request/logger
 */

import { getLogger } from '@logtape/logtape'
import {
	parseConfig,
	type RequestLoggingConfig,
	type RequestLoggingConfigInput,
	RequestLoggingConfigSchema,
} from '../config/index.ts'
import { escapeMessageTemplate } from '../logging/template.ts'

type LogMethod = (message: string, properties?: Record<string, unknown>) => void

/**
 * Where request lines go. A LogTape `Logger` satisfies it.
 * `message` is a LogTape template: braces from the method and path arrive doubled.
 */
export interface RequestLogSink {
	info: LogMethod
	warning: LogMethod
	error: LogMethod
}

/**
 * A completed HTTP request.
 */
export interface RequestLogEntry {
	method: string
	path: string
	statusCode: number
	/** Seconds */
	duration: number
	userAgent?: string
	ipAddress?: string
	headers?: Readonly<Record<string, string>>
	queryParams?: Readonly<Record<string, unknown>>
	body?: string
	userId?: string
	sessionId?: string
	requestId?: string
	/** Merged into the attributes last */
	extra?: Readonly<Record<string, unknown>>
}

export interface RequestLoggerOptions {
	/** Defaults to the LogTape logger for category `requests` */
	logger?: RequestLogSink
	config?: RequestLoggingConfigInput
}

/**
 * Level for a response status.
 */
export function levelForStatus(statusCode: number): keyof RequestLogSink {
	if (statusCode >= 500) return 'error'
	if (statusCode >= 400) return 'warning'
	return 'info'
}

/**
 * Drop headers whose lower-cased name is listed in `sensitive`.
 */
export function redactHeaders(
	headers: Readonly<Record<string, string>>,
	sensitive: readonly string[],
): Record<string, string> {
	const blocked = new Set(sensitive)
	return Object.fromEntries(
		Object.entries(headers).filter(([name]) => !blocked.has(name.toLowerCase())),
	)
}

function isEmpty(record: Readonly<Record<string, unknown>> | undefined): boolean {
	return record === undefined || Object.keys(record).length === 0
}

export class RequestLogger {
	readonly config: RequestLoggingConfig
	private readonly logger: RequestLogSink

	constructor(options: RequestLoggerOptions = {}) {
		this.config = parseConfig(
			RequestLoggingConfigSchema,
			options.config,
			'request logging',
		)
		this.logger = options.logger ?? getLogger(['requests'])
	}

	/**
	 * Log a completed request. Does nothing when request logging is disabled.
	 */
	logRequest(entry: RequestLogEntry): void {
		if (!this.config.enabled) return

		const { method, path, statusCode, duration } = entry
		const attributes: Record<string, unknown> = { method, path }

		if (this.config.logStatusCodes) {
			attributes.status_code = statusCode
		}
		if (this.config.logResponseTime) {
			attributes.duration_ms = duration * 1000
			attributes.duration_seconds = duration
		}
		if (this.config.logHeaders && entry.headers && !isEmpty(entry.headers)) {
			attributes.headers = redactHeaders(
				entry.headers,
				this.config.sensitiveHeaders,
			)
		}
		if (this.config.logQueryParams && !isEmpty(entry.queryParams)) {
			attributes.query_params = entry.queryParams
		}
		if (this.config.logBody && entry.body) {
			attributes.body = entry.body
		}
		if (entry.userAgent) attributes.user_agent = entry.userAgent
		if (entry.ipAddress) attributes.ip_address = entry.ipAddress
		if (entry.userId) attributes.user_id = entry.userId
		if (entry.sessionId) attributes.session_id = entry.sessionId
		if (entry.requestId) attributes.request_id = entry.requestId
		Object.assign(attributes, entry.extra)

		const timing = this.config.logResponseTime
			? ` (${duration.toFixed(3)}s)`
			: ''
		this.logger[levelForStatus(statusCode)](
			`HTTP ${escapeMessageTemplate(method)} ${escapeMessageTemplate(path)} - ${statusCode}${timing}`,
			attributes,
		)
	}
}

/**
 * Create a {@link RequestLogger}.
 */
export function setupRequestLogging(
	options: RequestLoggerOptions = {},
): RequestLogger {
	return new RequestLogger(options)
}
