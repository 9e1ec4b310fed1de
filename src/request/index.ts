/**
 * HTTP request logging.
 *
 * @module request
 */

export {
	levelForStatus,
	redactHeaders,
	type RequestLogEntry,
	RequestLogger,
	type RequestLoggerOptions,
	type RequestLogSink,
	setupRequestLogging,
} from './logger.ts'
export {
	createRequestMiddleware,
	type HeaderValues,
	normalizeHeaders,
	type RequestLike,
	type RequestMiddleware,
	type RequestMiddlewareOptions,
	type ResponseLike,
} from './middleware.ts'
