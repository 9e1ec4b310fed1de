/**
 * Sink factories: the handlers behind every configured logger.
 *
 * Console output goes through a plain stream sink; files go through
 * `@logtape/file`'s size-based rotating sink. Each sink is wrapped in a level
 * filter so a handler can be quieter than the logger feeding it; the wrapper
 * forwards disposal so LogTape's reset still flushes and closes files.
 *
 * @module handlers/sinks
 */

import { existsSync, mkdirSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { getRotatingFileSink } from '@logtape/file'
import {
	getLevelFilter,
	type LogRecord,
	type Sink,
	type TextFormatter,
} from '@logtape/logtape'
import type {
	ConsoleHandlerConfig,
	FileHandlerConfig,
	LogConfig,
} from '../config/index.ts'
import { ConfigurationError } from '../errors/index.ts'
import { type FormatterSelection, selectFormatter } from '../formatters/index.ts'
import {
	DEFAULT_LOG_EXTENSION,
	DEFAULT_MAX_FILES,
	DEFAULT_MAX_SIZE,
	type LogLevel,
} from '../logging/config.ts'

/**
 * Anything with a string `write`, such as `process.stdout`.
 */
export interface WritableLike {
	write(chunk: string): unknown
}

/**
 * Streams the console handler writes to. Overridable for tests.
 */
export interface ConsoleStreams {
	stdout?: WritableLike
	stderr?: WritableLike
}

/**
 * Options for a rotating file sink.
 */
export interface RotatingFileSinkOptions {
	/** Maximum file size before rotation. Defaults to 10 MiB. */
	maxBytes?: number
	/** Number of rotated files to keep. Defaults to 5. */
	backupCount?: number
	/** Lowest level the sink accepts. Defaults to accepting everything. */
	level?: LogLevel
	formatter: TextFormatter
}

/**
 * Sink that writes each formatted record to a stream.
 */
export function createStreamSink(
	stream: WritableLike,
	formatter: TextFormatter,
): Sink {
	return (record: LogRecord) => {
		stream.write(formatter(record))
	}
}

/**
 * Drop records below `level` before they reach `sink`.
 */
export function filterSink(
	sink: Sink & Partial<Disposable>,
	level: LogLevel,
): Sink & Disposable {
	const accepts = getLevelFilter(level)
	const filtered = (record: LogRecord): void => {
		if (accepts(record)) sink(record)
	}
	return Object.assign(filtered, {
		[Symbol.dispose]: () => {
			sink[Symbol.dispose]?.()
		},
	})
}

/**
 * Console handler for a {@link ConsoleHandlerConfig}.
 *
 * @param config - Console handler configuration
 * @param formatting - Text options (timestamp, logger name) from the logger config
 * @param streams - Optional stream overrides (defaults to process.stdout/stderr)
 */
export function createConsoleSink(
	config: ConsoleHandlerConfig,
	formatting: FormatterSelection = {},
	streams: ConsoleStreams = {},
): Sink & Disposable {
	const stream =
		config.stream === 'stderr'
			? (streams.stderr ?? process.stderr)
			: (streams.stdout ?? process.stdout)

	const formatter = selectFormatter(config.format, {
		...formatting,
		colors: config.colors,
	})

	return filterSink(createStreamSink(stream, formatter), config.level)
}

/**
 * Resolve where a file handler writes.
 *
 * Uses `filename` when set, otherwise `<directory>/<name>.log`.
 *
 * @throws ConfigurationError with code `MISSING_LOG_PATH` when neither is set
 */
export function resolveLogFilePath(
	config: Pick<FileHandlerConfig, 'filename' | 'directory'>,
	name: string,
): string {
	if (config.filename) return config.filename
	if (config.directory) {
		return join(config.directory, `${name}${DEFAULT_LOG_EXTENSION}`)
	}
	throw new ConfigurationError(
		'Either filename or directory must be specified for file handler',
		'MISSING_LOG_PATH',
		{ name },
	)
}

/**
 * Size-rotating file sink. Creates the parent directory when missing.
 *
 * @example
 * ```typescript
 * const sink = createRotatingFileSink("/var/log/app/errors.log", {
 *   formatter: createStructuredFormatter(),
 *   level: "error",
 *   maxBytes: 5 * 1024 * 1024,
 *   backupCount: 3,
 * });
 * ```
 */
export function createRotatingFileSink(
	path: string,
	options: RotatingFileSinkOptions,
): Sink & Disposable {
	const {
		maxBytes = DEFAULT_MAX_SIZE,
		backupCount = DEFAULT_MAX_FILES,
		level,
		formatter,
	} = options

	const dir = dirname(path)
	if (!existsSync(dir)) {
		mkdirSync(dir, { recursive: true })
	}

	const sink = getRotatingFileSink(path, {
		formatter,
		maxSize: maxBytes,
		maxFiles: backupCount,
	})

	return level ? filterSink(sink, level) : sink
}

/**
 * File handler for a {@link FileHandlerConfig}.
 */
export function createFileSink(
	config: FileHandlerConfig,
	name: string,
	formatting: FormatterSelection = {},
): Sink & Disposable {
	return createRotatingFileSink(resolveLogFilePath(config, name), {
		formatter: selectFormatter(config.format, { ...formatting, colors: false }),
		level: config.level,
		maxBytes: config.maxBytes,
		backupCount: config.backupCount,
	})
}

/**
 * Build the enabled handlers of a logger configuration.
 *
 * @returns Sinks keyed `console` and/or `file`
 */
export function buildHandlerSinks(
	config: LogConfig,
	name: string,
	streams: ConsoleStreams = {},
): Record<string, Sink & Disposable> {
	const formatting: FormatterSelection = {
		includeTimestamp: config.includeTimestamp,
		includeLoggerName: config.includeLoggerName,
	}
	const sinks: Record<string, Sink & Disposable> = {}

	if (config.console.enabled) {
		sinks.console = createConsoleSink(config.console, formatting, streams)
	}

	if (config.file?.enabled) {
		sinks.file = createFileSink(config.file, name, formatting)
	}

	return sinks
}
