/**
 * Logger setup.
 *
 * Creates configured LogTape loggers with:
 * - Console and/or size-rotating file output per {@link LogConfig}
 * - Hierarchical categories from dotted names ("app.db" → ["app", "db"])
 * - Extra fields bound to every record of the configured logger
 */

import { getLogger as getLogTapeLogger, type Logger } from '@logtape/logtape'
import {
	ConsoleHandlerConfigSchema,
	type LogConfig,
	type LogConfigInput,
	loadConfigFromEnv,
	parseLogConfig,
} from '../config/index.ts'
import {
	buildHandlerSinks,
	type ConsoleStreams,
	createConsoleSink,
} from '../handlers/index.ts'
import {
	DEFAULT_LOGGER_NAME,
	type LogFormat,
	type LogLevel,
} from './config.ts'
import {
	getLoggingRegistry,
	type LoggingRegistry,
	ROOT_PLAN,
} from './registry.ts'

/**
 * Options for {@link setupLogger}.
 */
export interface SetupLoggerOptions {
	/**
	 * Directory for a `<name>.log` file handler. Ignored when `config` is given.
	 */
	logDir?: string

	/**
	 * Capture debug records (logger and handlers). Ignored when `config` is given.
	 */
	debug?: boolean

	/** Full configuration; validated with {@link parseLogConfig}. */
	config?: LogConfigInput

	/** Registry to register with. Defaults to {@link getLoggingRegistry}. */
	registry?: LoggingRegistry

	/** Console stream overrides. */
	streams?: ConsoleStreams
}

/**
 * Category for a dotted logger name.
 *
 * @example
 * ```typescript
 * toCategory("app.db.pool"); // ["app", "db", "pool"]
 * ```
 */
export function toCategory(name: string): string[] {
	return name.split('.').filter((part) => part.length > 0)
}

/**
 * Get a logger by dotted name; the root logger when no name is given.
 *
 * Loggers are cheap handles. They emit nothing until a setup function has
 * configured sinks for their category or one of its parents.
 */
export function getLogger(name?: string): Logger {
	return getLogTapeLogger(name ? toCategory(name) : [])
}

function resolveConfig(name: string, options: SetupLoggerOptions): LogConfig {
	if (options.config) {
		return parseLogConfig(options.config)
	}

	const level = options.debug ? 'debug' : 'info'
	return parseLogConfig({
		level,
		console: { level },
		...(options.logDir ? { file: { level, directory: options.logDir } } : {}),
	})
}

/**
 * Set up a named logger.
 *
 * Calling it again for the same name replaces that logger's handlers; other
 * loggers keep theirs.
 *
 * @param name - Dotted logger name
 * @param options - Configuration, or the `logDir`/`debug` shorthand
 * @returns LogTape logger for `name`, bound to `extraFields`
 *
 * @example
 * ```typescript
 * const logger = await setupLogger("billing", { logDir: "./logs", debug: true });
 * logger.info("Invoice sent", { invoiceId: "inv-1" });
 * // console: 2025-01-02T03:04:05.678Z - billing - INFO - Invoice sent [invoiceId=inv-1]
 * // file:    ./logs/billing.log
 * ```
 */
export async function setupLogger(
	name: string,
	options: SetupLoggerOptions = {},
): Promise<Logger> {
	const config = resolveConfig(name, options)
	const registry = options.registry ?? getLoggingRegistry()
	const category = toCategory(name)

	await registry.register(`logger:${name}`, () => {
		const sinks = buildHandlerSinks(config, name, options.streams)
		return {
			sinks,
			loggers: [
				{ category, sinks: Object.keys(sinks), lowestLevel: config.level },
			],
		}
	})

	const logger = getLogTapeLogger(category)
	logger.debug('Logging initialized', {
		logger: name,
		level: config.level,
		console: config.console.enabled,
		file: config.file?.enabled ?? false,
	})

	return Object.keys(config.extraFields).length > 0
		? logger.with(config.extraFields)
		: logger
}

/**
 * Set up a logger from an untyped configuration object (e.g., parsed JSON).
 *
 * The logger name comes from `name`, falling back to "tracelight".
 *
 * @throws ConfigurationError when the object does not validate
 */
export async function setupLoggingFromObject(
	input: unknown,
	options: Omit<SetupLoggerOptions, 'config'> = {},
): Promise<Logger> {
	const config = parseLogConfig(input)
	return setupLogger(config.name ?? DEFAULT_LOGGER_NAME, { ...options, config })
}

/**
 * Set up a logger from `TRACELIGHT_LOG_*` environment variables.
 */
export async function setupLoggingFromEnv(
	env: NodeJS.ProcessEnv = process.env,
	options: Omit<SetupLoggerOptions, 'config'> = {},
): Promise<Logger> {
	const config = loadConfigFromEnv(env)
	return setupLogger(config.name ?? DEFAULT_LOGGER_NAME, { ...options, config })
}

/**
 * Options for {@link setupStructuredLogging}.
 */
export interface StructuredLoggingOptions {
	config?: LogConfigInput
	/** Overrides `config.level` */
	level?: LogLevel | Uppercase<LogLevel>
	/** Overrides `config.format` */
	format?: LogFormat
	registry?: LoggingRegistry
	streams?: ConsoleStreams
}

/**
 * Route every category to stdout: JSON lines for the `json` format,
 * coloured text otherwise. Replaces any other root setup.
 */
export async function setupStructuredLogging(
	options: StructuredLoggingOptions = {},
): Promise<void> {
	const config = parseLogConfig({
		...options.config,
		...(options.level ? { level: options.level } : {}),
		...(options.format ? { format: options.format } : {}),
	})
	const registry = options.registry ?? getLoggingRegistry()
	const format = config.format === 'json' ? 'json' : 'text'

	await registry.register(ROOT_PLAN, () => ({
		sinks: {
			console: createConsoleSink(
				ConsoleHandlerConfigSchema.parse({
					level: config.level,
					format,
					colors: format === 'text',
				}),
				{
					includeTimestamp: config.includeTimestamp,
					includeLoggerName: config.includeLoggerName,
				},
				options.streams,
			),
		},
		loggers: [{ category: [], sinks: ['console'], lowestLevel: config.level }],
	}))
}

/**
 * Drop every logger set up through the default registry and reset LogTape.
 */
export async function resetLogging(): Promise<void> {
	await getLoggingRegistry().reset()
}
