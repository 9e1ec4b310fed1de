/**
 * Configuration schemas for the logging facade.
 *
 * Every record is a Zod schema with defaults, so `parse({})` yields a
 * complete configuration. Keys are camelCase; levels are accepted in any
 * case and with the common aliases `warn` and `critical`.
 *
 * @module config/schema
 */

import { z } from 'zod'
import { ConfigurationError } from '../errors/index.ts'
import {
	DEFAULT_LOG_LEVEL,
	DEFAULT_MAX_FILES,
	DEFAULT_MAX_SIZE,
	LOG_FORMATS,
	LOG_LEVELS,
	type LogLevel,
} from '../logging/config.ts'

const LEVEL_ALIASES: Record<string, LogLevel> = {
	warn: 'warning',
	critical: 'fatal',
}

export const LogLevelSchema = z
	.string()
	.transform((value) => {
		const lowered = value.trim().toLowerCase()
		return LEVEL_ALIASES[lowered] ?? lowered
	})
	.pipe(z.enum(LOG_LEVELS))

export const LogFormatSchema = z
	.string()
	.transform((value) => value.trim().toLowerCase())
	.pipe(z.enum(LOG_FORMATS))

const handlerFields = {
	enabled: z.boolean().default(true),
	level: LogLevelSchema.default('info'),
	format: LogFormatSchema.default('text'),
}

export const ConsoleHandlerConfigSchema = z.object({
	...handlerFields,
	stream: z.enum(['stdout', 'stderr']).default('stdout'),
	colors: z.boolean().default(false),
})

export const FileHandlerConfigSchema = z.object({
	...handlerFields,
	filename: z.string().min(1).optional(),
	directory: z.string().min(1).optional(),
	maxBytes: z.number().int().positive().default(DEFAULT_MAX_SIZE),
	backupCount: z.number().int().nonnegative().default(DEFAULT_MAX_FILES),
})

export const PerformanceConfigSchema = z.object({
	enabled: z.boolean().default(true),
	/** Attach a heap/RSS snapshot to every emitted performance line */
	trackMemory: z.boolean().default(true),
	/** Attach process CPU time to every emitted performance line */
	trackCpu: z.boolean().default(true),
	/** Samples at or above this many milliseconds are logged when recorded */
	thresholdMs: z.number().nonnegative().default(1000),
})

export const RequestLoggingConfigSchema = z.object({
	enabled: z.boolean().default(true),
	logHeaders: z.boolean().default(false),
	logBody: z.boolean().default(false),
	logQueryParams: z.boolean().default(true),
	logResponseTime: z.boolean().default(true),
	logStatusCodes: z.boolean().default(true),
	sensitiveHeaders: z
		.array(z.string())
		.default(['authorization', 'cookie'])
		.transform((headers) => headers.map((header) => header.toLowerCase())),
})

export const TrainingLoggingConfigSchema = z.object({
	enabled: z.boolean().default(true),
	logMetrics: z.boolean().default(true),
	logCheckpoints: z.boolean().default(true),
	logValidation: z.boolean().default(true),
	logHyperparameters: z.boolean().default(true),
})

export const LogConfigSchema = z.object({
	level: LogLevelSchema.default(DEFAULT_LOG_LEVEL),
	format: LogFormatSchema.default('text'),
	name: z.string().min(1).optional(),
	console: ConsoleHandlerConfigSchema.default({}),
	file: FileHandlerConfigSchema.optional(),
	performance: PerformanceConfigSchema.default({}),
	request: RequestLoggingConfigSchema.default({}),
	training: TrainingLoggingConfigSchema.default({}),
	includeTimestamp: z.boolean().default(true),
	includeLoggerName: z.boolean().default(true),
	/** Properties bound to every record of the configured logger */
	extraFields: z.record(z.unknown()).default({}),
})

export type ConsoleHandlerConfig = z.infer<typeof ConsoleHandlerConfigSchema>
export type FileHandlerConfig = z.infer<typeof FileHandlerConfigSchema>
export type PerformanceConfig = z.infer<typeof PerformanceConfigSchema>
export type RequestLoggingConfig = z.infer<typeof RequestLoggingConfigSchema>
export type TrainingLoggingConfig = z.infer<typeof TrainingLoggingConfigSchema>
export type LogConfig = z.infer<typeof LogConfigSchema>

export type FileHandlerConfigInput = z.input<typeof FileHandlerConfigSchema>
export type PerformanceConfigInput = z.input<typeof PerformanceConfigSchema>
export type RequestLoggingConfigInput = z.input<
	typeof RequestLoggingConfigSchema
>
export type TrainingLoggingConfigInput = z.input<
	typeof TrainingLoggingConfigSchema
>
export type LogConfigInput = z.input<typeof LogConfigSchema>

/**
 * Validate `input` against `schema`, raising a {@link ConfigurationError}
 * that lists every issue.
 *
 * @param what - Name of the record in the error message (e.g., "logging")
 */
export function parseConfig<S extends z.ZodTypeAny>(
	schema: S,
	input: unknown,
	what: string,
): z.output<S> {
	const result = schema.safeParse(input ?? {})
	if (!result.success) {
		const issues = result.error.issues.map(
			(issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`,
		)
		throw new ConfigurationError(
			`Invalid ${what} configuration: ${issues.join('; ')}`,
			'INVALID_CONFIG',
			{ issues },
			result.error,
		)
	}
	return result.data
}

/**
 * Validate arbitrary input as a {@link LogConfig}.
 *
 * @throws ConfigurationError with code `INVALID_CONFIG` listing every issue
 *
 * @example
 * ```typescript
 * const config = parseLogConfig({ level: "DEBUG", file: { directory: "./logs" } });
 * config.file?.maxBytes; // 10485760
 * ```
 */
export function parseLogConfig(input: unknown): LogConfig {
	return parseConfig(LogConfigSchema, input, 'logging')
}
