/**
 * tracelight
 *
 * Logging facade on LogTape: configured loggers, rotating files, and
 * performance, request and training event logging.
 *
 * The common entry points are re-exported here. Everything else lives in
 * subpath exports:
 *   import { createJsonFormatter } from "tracelight/formatters";
 *   import { computeStatistics } from "tracelight/performance";
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0'

export {
	setupDevelopmentLogging,
	setupLogAggregation,
	setupLogRotation,
	setupPerformanceMonitoring,
	setupProductionLogging,
} from './aggregation/index.ts'
export {
	type LogConfig,
	type LogConfigInput,
	loadConfigFromEnv,
	parseLogConfig,
} from './config/index.ts'
export {
	ConfigurationError,
	InvalidInputError,
	StructuredError,
} from './errors/index.ts'
export {
	createCorrelationId,
	getLogger,
	resetLogging,
	setupLogger,
	setupLoggingFromEnv,
	setupLoggingFromObject,
	setupStructuredLogging,
} from './logging/index.ts'
export {
	getPerformanceTracker,
	logPerformance,
	PerformanceContext,
	PerformanceTracker,
	resetPerformanceTracker,
	setupPerformanceLogging,
	trackPerformance,
} from './performance/index.ts'
export { createRequestMiddleware, RequestLogger } from './request/index.ts'
export { TrainingLogger } from './training/index.ts'
