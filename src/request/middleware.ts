/**
 * Framework-neutral request logging middleware.
 *
 * Reads what it can from loosely shaped request and response objects and
 * hands a {@link RequestLogEntry} to a {@link RequestLogger}.
 *
 * @module request/middleware
 */

import type { RequestLoggingConfigInput } from '../config/index.ts'
import { createCorrelationId } from '../logging/correlation.ts'
import { RequestLogger } from './logger.ts'

/**
 * Header values as Node's `IncomingMessage` exposes them.
 */
export type HeaderValues = Readonly<
	Record<string, string | readonly string[] | undefined>
>

export interface RequestLike {
	method?: string
	path?: string
	headers?: HeaderValues
	clientIp?: string
	userId?: string
	sessionId?: string
	requestId?: string
}

export interface ResponseLike {
	statusCode?: number
}

export interface RequestMiddlewareOptions {
	/** Request logger to use; built from `config` when absent */
	logger?: RequestLogger
	config?: RequestLoggingConfigInput
	/** Fill in a correlation ID for requests that carry none */
	generateRequestIds?: boolean
}

/**
 * @param duration - Seconds
 * @param extra - Attributes merged into the line
 */
export type RequestMiddleware = (
	request: RequestLike,
	response: ResponseLike,
	duration: number,
	extra?: Record<string, unknown>,
) => void

/**
 * Flatten header values: arrays are joined with ", ", missing values dropped.
 */
export function normalizeHeaders(headers: HeaderValues): Record<string, string> {
	const result: Record<string, string> = {}
	for (const [name, value] of Object.entries(headers)) {
		if (value === undefined) continue
		result[name] = typeof value === 'string' ? value : value.join(', ')
	}
	return result
}

function findHeader(
	headers: Record<string, string>,
	name: string,
): string | undefined {
	const wanted = name.toLowerCase()
	for (const [key, value] of Object.entries(headers)) {
		if (key.toLowerCase() === wanted) return value
	}
	return undefined
}

/**
 * Create the middleware.
 *
 * @example
 * ```typescript
 * const logRequest = createRequestMiddleware({ generateRequestIds: true });
 *
 * server.on("request", (req, res) => {
 *   const start = performance.now();
 *   res.on("finish", () => {
 *     logRequest(
 *       { method: req.method, path: req.url, headers: req.headers },
 *       res,
 *       (performance.now() - start) / 1000,
 *     );
 *   });
 * });
 * ```
 */
export function createRequestMiddleware(
	options: RequestMiddlewareOptions = {},
): RequestMiddleware {
	const logger = options.logger ?? new RequestLogger({ config: options.config })
	const generateRequestIds = options.generateRequestIds ?? false

	return (request, response, duration, extra) => {
		const headers = normalizeHeaders(request.headers ?? {})
		const requestId =
			request.requestId ??
			(generateRequestIds ? createCorrelationId() : undefined)

		logger.logRequest({
			method: request.method ?? 'UNKNOWN',
			path: request.path ?? '/',
			statusCode: response.statusCode ?? 200,
			duration,
			headers,
			userAgent: findHeader(headers, 'user-agent'),
			ipAddress: request.clientIp,
			userId: request.userId,
			sessionId: request.sessionId,
			requestId,
			extra,
		})
	}
}
