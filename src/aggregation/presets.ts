/**
 * Ready-made logging layouts for whole applications.
 *
 * The root presets (rotation, aggregation, production, development) share one
 * registry plan, so calling another one replaces the previous layout.
 * Performance, request and training output uses the `performance`,
 * `requests` and `training` categories, which also reach the root sinks.
 *
 * @example
 * ```typescript
 * await setupProductionLogging("/var/log/shop");
 * // /var/log/shop/app.log          everything at info, JSON lines
 * // /var/log/shop/errors.log       errors, structured JSON
 * // /var/log/shop/performance.log  slow operations
 * // /var/log/shop/requests.log     HTTP requests
 * ```
 *
 * @module aggregation/presets
 */

import { join } from 'node:path'
import type { Sink } from '@logtape/logtape'
import {
	ConsoleHandlerConfigSchema,
	type LogConfigInput,
	type PerformanceConfigInput,
	parseLogConfig,
} from '../config/index.ts'
import { createTextFormatter, selectFormatter } from '../formatters/index.ts'
import {
	type ConsoleStreams,
	createConsoleSink,
	createErrorSink,
	createPerformanceSink,
	createRequestSink,
	createRotatingFileSink,
} from '../handlers/index.ts'
import {
	DEFAULT_MAX_FILES,
	DEFAULT_MAX_SIZE,
	type LogFormat,
	type LogLevel,
} from '../logging/config.ts'
import {
	getLoggingRegistry,
	type LoggingRegistry,
	type PlanLogger,
	ROOT_PLAN,
} from '../logging/registry.ts'
import {
	type PerformanceLogger,
	type PerformanceTracker,
	setupPerformanceLogging,
} from '../performance/index.ts'

export interface PresetOptions {
	/** Registry to register with. Defaults to {@link getLoggingRegistry}. */
	registry?: LoggingRegistry
	/** Console stream overrides */
	streams?: ConsoleStreams
}

export interface LogRotationOptions extends PresetOptions {
	maxBytes?: number
	backupCount?: number
}

/**
 * Root logging to stdout at info and to a size-rotated `app.log` at debug.
 */
export async function setupLogRotation(
	logDir: string,
	options: LogRotationOptions = {},
): Promise<void> {
	const {
		maxBytes = DEFAULT_MAX_SIZE,
		backupCount = DEFAULT_MAX_FILES,
		registry = getLoggingRegistry(),
	} = options

	await registry.register(ROOT_PLAN, () => ({
		sinks: {
			console: createConsoleSink(
				ConsoleHandlerConfigSchema.parse({ level: 'info' }),
				{},
				options.streams,
			),
			file: createRotatingFileSink(join(logDir, 'app.log'), {
				formatter: createTextFormatter(),
				level: 'debug',
				maxBytes,
				backupCount,
			}),
		},
		loggers: [{ category: [], sinks: ['console', 'file'], lowestLevel: 'debug' }],
	}))
}

/**
 * Root logging split into dedicated files under `logDir`.
 *
 * - `app.log`: everything at the file handler's level (when `file` is enabled)
 * - `errors.log`: errors, structured JSON
 * - `performance.log`: the `performance` category (when performance is enabled)
 * - `requests.log`: the `requests` category (when request logging is enabled)
 * - console (when enabled)
 *
 * @throws ConfigurationError when `config` does not validate
 */
export async function setupLogAggregation(
	logDir: string,
	config: LogConfigInput = {},
	options: PresetOptions = {},
): Promise<void> {
	const parsed = parseLogConfig(config)
	const registry = options.registry ?? getLoggingRegistry()
	const formatting = {
		includeTimestamp: parsed.includeTimestamp,
		includeLoggerName: parsed.includeLoggerName,
	}

	await registry.register(ROOT_PLAN, () => {
		const sinks: Record<string, Sink & Disposable> = {}
		const loggers: PlanLogger[] = []

		if (parsed.file?.enabled) {
			sinks.app = createRotatingFileSink(join(logDir, 'app.log'), {
				formatter: selectFormatter(parsed.file.format, formatting),
				level: parsed.file.level,
				maxBytes: parsed.file.maxBytes,
				backupCount: parsed.file.backupCount,
			})
		}

		sinks.errors = createErrorSink(logDir)

		if (parsed.console.enabled) {
			sinks.console = createConsoleSink(
				parsed.console,
				formatting,
				options.streams,
			)
		}

		loggers.push({
			category: [],
			sinks: Object.keys(sinks),
			lowestLevel: parsed.level,
		})

		if (parsed.performance.enabled) {
			sinks.performance = createPerformanceSink(logDir)
			loggers.push({
				category: ['performance'],
				sinks: ['performance'],
				lowestLevel: 'info',
			})
		}

		if (parsed.request.enabled) {
			sinks.requests = createRequestSink(logDir)
			loggers.push({
				category: ['requests'],
				sinks: ['requests'],
				lowestLevel: 'info',
			})
		}

		return { sinks, loggers }
	})
}

export interface PerformanceMonitoringOptions {
	config?: PerformanceConfigInput
	/** Write the `performance` category to `performance.log` here */
	logDir?: string
	/** Logger for the new tracker; defaults to the `performance` category */
	logger?: PerformanceLogger
	registry?: LoggingRegistry
}

/**
 * Replace the default performance tracker, optionally with a
 * `performance.log` file for its output.
 *
 * @returns The new default tracker
 */
export async function setupPerformanceMonitoring(
	options: PerformanceMonitoringOptions = {},
): Promise<PerformanceTracker> {
	const { config, logDir, logger } = options

	if (logDir) {
		const registry = options.registry ?? getLoggingRegistry()
		await registry.register('performance', () => ({
			sinks: { file: createPerformanceSink(logDir) },
			loggers: [
				{ category: ['performance'], sinks: ['file'], lowestLevel: 'info' },
			],
		}))
	}

	return setupPerformanceLogging({ config, ...(logger ? { logger } : {}) })
}

export interface ProductionLoggingOptions extends PresetOptions {
	level?: LogLevel | Uppercase<LogLevel>
	format?: LogFormat
}

/**
 * {@link setupLogAggregation} with `app.log` enabled, JSON by default.
 */
export async function setupProductionLogging(
	logDir: string,
	options: ProductionLoggingOptions = {},
): Promise<void> {
	const { level = 'INFO', format = 'json', ...preset } = options

	await setupLogAggregation(
		logDir,
		{
			level,
			format,
			console: { level, format },
			file: { enabled: true, directory: logDir, level, format },
		},
		preset,
	)
}

/**
 * Everything at debug to stdout, level labels coloured.
 */
export async function setupDevelopmentLogging(
	options: PresetOptions = {},
): Promise<void> {
	const registry = options.registry ?? getLoggingRegistry()

	await registry.register(ROOT_PLAN, () => ({
		sinks: {
			console: createConsoleSink(
				ConsoleHandlerConfigSchema.parse({ level: 'debug', colors: true }),
				{},
				options.streams,
			),
		},
		loggers: [{ category: [], sinks: ['console'], lowestLevel: 'debug' }],
	}))
}
