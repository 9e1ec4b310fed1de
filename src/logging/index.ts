/**
 * Logger setup on top of LogTape.
 *
 * Provides:
 * - **setupLogger**: Console and rotating-file handlers per logger name
 * - **Hierarchical categories**: "app.db" logs under "app"
 * - **LoggingRegistry**: Many independently configured loggers, one LogTape config
 * - **Correlation IDs** for request tracing
 *
 * @example
 * ```typescript
 * import { setupLogger, getLogger } from "tracelight/logging";
 *
 * await setupLogger("app", { logDir: "./logs" });
 * getLogger("app.db").info("Connected", { pool: 4 });
 * ```
 *
 * @packageDocumentation
 */

export {
	DEFAULT_LOG_EXTENSION,
	DEFAULT_LOG_LEVEL,
	DEFAULT_LOGGER_NAME,
	DEFAULT_MAX_FILES,
	DEFAULT_MAX_SIZE,
	LOG_FORMATS,
	LOG_LEVELS,
	type LogFormat,
	type LogLevel,
	META_CATEGORY,
} from './config.ts'
export { createCorrelationId } from './correlation.ts'
export {
	getLogger,
	resetLogging,
	type SetupLoggerOptions,
	type StructuredLoggingOptions,
	setupLogger,
	setupLoggingFromEnv,
	setupLoggingFromObject,
	setupStructuredLogging,
	toCategory,
} from './factory.ts'
export {
	getLoggingRegistry,
	type LoggingPlan,
	LoggingRegistry,
	type LoggingRegistryOptions,
	mergePlanLoggers,
	type PlanBuilder,
	type PlanLogger,
	ROOT_PLAN,
} from './registry.ts'
export { escapeMessageTemplate } from './template.ts'
