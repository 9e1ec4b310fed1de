/**
 * Correlation ID utilities for request tracing.
 *
 * Correlation IDs link the log lines of one request across handlers.
 */

/**
 * Generate an 8-character correlation ID.
 *
 * Takes the first 8 characters of crypto.randomUUID(), which gives
 * ~4 billion distinct IDs: enough for process-local correlation.
 *
 * @example
 * ```typescript
 * const requestId = createCorrelationId();
 * requestLogger.logRequest({ method: "GET", path: "/", statusCode: 200, duration: 0.01, requestId });
 * ```
 */
export function createCorrelationId(): string {
	return crypto.randomUUID().slice(0, 8)
}
