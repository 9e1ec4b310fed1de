/**
 * Registry of logging plans applied to LogTape as one configuration.
 *
 * LogTape holds a single process-wide configuration, while callers set up
 * loggers one at a time. Each caller registers a plan (its sinks and the
 * categories they serve) under an id; every change re-applies all plans with
 * `configure({ reset: true })`. Sinks are rebuilt on each apply because the
 * reset disposes the previous ones.
 *
 * @module logging/registry
 */

import {
	configure,
	type LoggerConfig,
	reset,
	type Sink,
} from '@logtape/logtape'
import { createTextFormatter } from '../formatters/index.ts'
import { createStreamSink, type WritableLike } from '../handlers/index.ts'
import {
	LOGTAPE_META_CATEGORY,
	type LogLevel,
	META_CATEGORY,
	mostVerboseLevel,
} from './config.ts'

/**
 * A logger entry of a plan. `sinks` name keys of the plan's `sinks` record.
 */
export interface PlanLogger {
	category: readonly string[]
	sinks: readonly string[]
	lowestLevel: LogLevel
}

export interface LoggingPlan {
	sinks: Record<string, Sink>
	loggers: readonly PlanLogger[]
}

/**
 * Builds a plan. Called on every apply, so it must create fresh sinks.
 */
export type PlanBuilder = () => LoggingPlan

export interface LoggingRegistryOptions {
	/** Where diagnostics of LogTape and this package go. Defaults to stderr. */
	metaStream?: WritableLike
}

const META_SINK = 'meta'

/**
 * Plan id shared by the setups that configure the root category, so each one
 * replaces the previous.
 */
export const ROOT_PLAN = 'root'

function categoryKey(category: readonly string[]): string {
	return category.join('\u0000')
}

type MaybeDisposableSink = Sink & Partial<Disposable>

function disposeAll(sinks: Record<string, MaybeDisposableSink>): void {
	for (const sink of Object.values(sinks)) {
		sink[Symbol.dispose]?.()
	}
}

/**
 * Merge logger entries that target the same category: sinks are concatenated
 * and the most verbose level wins.
 */
export function mergePlanLoggers(
	loggers: readonly PlanLogger[],
): PlanLogger[] {
	const merged = new Map<string, PlanLogger>()

	for (const logger of loggers) {
		const key = categoryKey(logger.category)
		const existing = merged.get(key)
		if (existing) {
			merged.set(key, {
				category: existing.category,
				sinks: [...existing.sinks, ...logger.sinks],
				lowestLevel: mostVerboseLevel(existing.lowestLevel, logger.lowestLevel),
			})
		} else {
			merged.set(key, logger)
		}
	}

	return [...merged.values()]
}

/**
 * Registry of logging plans.
 *
 * @example
 * ```typescript
 * const registry = new LoggingRegistry();
 * await registry.register("logger:api", () => ({
 *   sinks: { console: createConsoleSink(consoleConfig) },
 *   loggers: [{ category: ["api"], sinks: ["console"], lowestLevel: "info" }],
 * }));
 * ```
 */
export class LoggingRegistry {
	private readonly builders = new Map<string, PlanBuilder>()
	private readonly metaStream: WritableLike | undefined

	constructor(options: LoggingRegistryOptions = {}) {
		this.metaStream = options.metaStream
	}

	/** Ids of the registered plans, in registration order */
	get ids(): string[] {
		return [...this.builders.keys()]
	}

	has(id: string): boolean {
		return this.builders.has(id)
	}

	/**
	 * Add or replace a plan and apply the configuration.
	 *
	 * When the plan fails to build, the previous plan for `id` (if any) is
	 * restored and the error propagates; LogTape is left untouched.
	 */
	async register(id: string, build: PlanBuilder): Promise<void> {
		const previous = this.builders.get(id)
		this.builders.set(id, build)

		try {
			await this.apply()
		} catch (error: unknown) {
			if (previous) {
				this.builders.set(id, previous)
			} else {
				this.builders.delete(id)
			}
			throw error
		}
	}

	/**
	 * Remove a plan and apply the remaining ones.
	 *
	 * @returns Whether a plan was removed
	 */
	async unregister(id: string): Promise<boolean> {
		if (!this.builders.delete(id)) return false
		await this.apply()
		return true
	}

	/**
	 * Build every plan and hand the merged configuration to LogTape.
	 */
	async apply(): Promise<void> {
		const sinks: Record<string, MaybeDisposableSink> = {
			[META_SINK]: createStreamSink(
				this.metaStream ?? process.stderr,
				createTextFormatter(),
			),
		}
		const loggers: PlanLogger[] = []

		try {
			for (const [id, build] of this.builders) {
				const plan = build()
				for (const [name, sink] of Object.entries(plan.sinks)) {
					sinks[`${id}/${name}`] = sink
				}
				for (const logger of plan.loggers) {
					loggers.push({
						...logger,
						sinks: logger.sinks.map((name) => `${id}/${name}`),
					})
				}
			}
		} catch (error: unknown) {
			disposeAll(sinks)
			throw error
		}

		for (const category of [LOGTAPE_META_CATEGORY, META_CATEGORY]) {
			loggers.push({ category, sinks: [META_SINK], lowestLevel: 'warning' })
		}

		const loggerConfigs: LoggerConfig<string, string>[] = mergePlanLoggers(
			loggers,
		).map((logger) => ({
			category: [...logger.category],
			sinks: [...logger.sinks],
			lowestLevel: logger.lowestLevel,
		}))

		await configure({ reset: true, sinks, loggers: loggerConfigs })
	}

	/**
	 * Drop every plan and reset LogTape, disposing its sinks.
	 */
	async reset(): Promise<void> {
		this.builders.clear()
		await reset()
	}
}

let defaultRegistry: LoggingRegistry | undefined

/**
 * Get or create the registry used when no registry is passed explicitly.
 */
export function getLoggingRegistry(): LoggingRegistry {
	if (!defaultRegistry) {
		defaultRegistry = new LoggingRegistry()
	}
	return defaultRegistry
}
