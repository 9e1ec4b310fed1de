/**
 * Typed configuration for loggers, handlers and the event loggers.
 *
 * @module config
 */

export { ENV_PREFIX, loadConfigFromEnv } from './env.ts'
export {
	type ConsoleHandlerConfig,
	ConsoleHandlerConfigSchema,
	type FileHandlerConfig,
	type FileHandlerConfigInput,
	FileHandlerConfigSchema,
	type LogConfig,
	type LogConfigInput,
	LogConfigSchema,
	LogFormatSchema,
	LogLevelSchema,
	type PerformanceConfig,
	type PerformanceConfigInput,
	PerformanceConfigSchema,
	parseConfig,
	parseLogConfig,
	type RequestLoggingConfig,
	type RequestLoggingConfigInput,
	RequestLoggingConfigSchema,
	type TrainingLoggingConfig,
	type TrainingLoggingConfigInput,
	TrainingLoggingConfigSchema,
} from './schema.ts'
