/**
 * Environment-variable configuration.
 *
 * | Variable | Default |
 * |---|---|
 * | `TRACELIGHT_LOG_LEVEL` | `INFO` |
 * | `TRACELIGHT_LOG_FORMAT` | `text` |
 * | `TRACELIGHT_LOG_NAME` | `tracelight` |
 * | `TRACELIGHT_LOG_DIR` | unset (no file handler) |
 *
 * @module config/env
 */

import { DEFAULT_LOGGER_NAME } from '../logging/config.ts'
import { type LogConfig, parseLogConfig } from './schema.ts'

export const ENV_PREFIX = 'TRACELIGHT_LOG_'

/**
 * Build a {@link LogConfig} from environment variables.
 *
 * @param env - Variables to read (defaults to `process.env`)
 * @throws ConfigurationError when a variable holds an unknown level or format
 */
export function loadConfigFromEnv(
	env: NodeJS.ProcessEnv = process.env,
): LogConfig {
	const directory = env[`${ENV_PREFIX}DIR`]

	return parseLogConfig({
		level: env[`${ENV_PREFIX}LEVEL`] ?? 'INFO',
		format: env[`${ENV_PREFIX}FORMAT`] ?? 'text',
		name: env[`${ENV_PREFIX}NAME`] || DEFAULT_LOGGER_NAME,
		...(directory ? { file: { directory, enabled: true } } : {}),
	})
}
