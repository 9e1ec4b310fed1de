/**
 * Performance metric recorder.
 *
 * Records timed samples into an in-memory buffer and emits the slow ones to a
 * logger as they arrive. Samples can be filtered back out and summarized.
 *
 * @example
 * ```typescript
 * const tracker = new PerformanceTracker({ config: { thresholdMs: 500 } });
 *
 * const users = await tracker.trackOperation("db.users", () => db.selectUsers(), {
 *   requestId: "req-1",
 * });
 *
 * tracker.getStatistics({ operation: "db.users" }).p95Duration;
 * ```
 *
 * @module performance/tracker
 */

import { getLogger } from '@logtape/logtape'
import {
	type PerformanceConfig,
	type PerformanceConfigInput,
	PerformanceConfigSchema,
	parseConfig,
} from '../config/index.ts'
import { InvalidInputError } from '../errors/index.ts'
import { META_CATEGORY } from '../logging/config.ts'
import { escapeMessageTemplate } from '../logging/template.ts'
import { SampleBuffer } from './buffer.ts'
import { captureCpu, captureMemory } from './resources.ts'
import { PerformanceSample, type SampleOptions } from './sample.ts'
import { computeStatistics, type PerformanceStatistics } from './statistics.ts'

/**
 * Where samples are emitted. A LogTape `Logger` satisfies it.
 * `message` is a LogTape template: braces from the operation name arrive doubled.
 */
export interface PerformanceLogger {
	info(message: string, properties?: Record<string, unknown>): void
}

export interface PerformanceTrackerOptions {
	/** Defaults to the LogTape logger for category `performance` */
	logger?: PerformanceLogger
	config?: PerformanceConfigInput
	/** Monotonic milliseconds, used for timing brackets. Defaults to `performance.now`. */
	clock?: () => number
	/** Timestamp source for new samples */
	now?: () => Date
}

export interface MetricsQuery {
	/** Exact operation name */
	operation?: string
	/** Keep samples recorded at or after this instant */
	since?: Date
	/** Keep only the most recent `limit` samples. `0` means no limit. */
	limit?: number
}

export type StatisticsQuery = Omit<MetricsQuery, 'limit'>

function validateOperation(operation: string): void {
	if (operation.trim().length === 0) {
		throw new InvalidInputError(
			'Operation name must be a non-empty string',
			'INVALID_OPERATION',
			{ operation },
		)
	}
}

function validateDuration(operation: string, duration: number): void {
	if (!Number.isFinite(duration) || duration < 0) {
		throw new InvalidInputError(
			`Duration must be a non-negative number of seconds, got ${duration}`,
			'INVALID_DURATION',
			{ operation, duration },
		)
	}
}

export class PerformanceTracker {
	readonly config: PerformanceConfig
	private readonly buffer = new SampleBuffer()
	private readonly logger: PerformanceLogger
	private readonly clock: () => number
	private readonly now: () => Date

	constructor(options: PerformanceTrackerOptions = {}) {
		this.config = parseConfig(
			PerformanceConfigSchema,
			options.config,
			'performance',
		)
		this.logger = options.logger ?? getLogger(['performance'])
		this.clock = options.clock ?? (() => performance.now())
		this.now = options.now ?? (() => new Date())
	}

	/** Number of buffered samples */
	get size(): number {
		return this.buffer.size
	}

	/**
	 * Record a sample.
	 *
	 * The sample is buffered first; when it is at or above the threshold it is
	 * then logged once at info level. A logger failure propagates, but the
	 * sample stays buffered.
	 *
	 * @param duration - Seconds
	 * @throws InvalidInputError for a blank operation or a negative duration
	 */
	record(
		operation: string,
		duration: number,
		options: SampleOptions = {},
	): PerformanceSample {
		validateOperation(operation)
		validateDuration(operation, duration)

		const sample = new PerformanceSample({
			...options,
			operation,
			duration,
			timestamp: this.now(),
		})
		this.buffer.append(sample)

		if (this.config.enabled && sample.durationMs >= this.config.thresholdMs) {
			this.emit(sample)
		}

		return sample
	}

	/**
	 * Time an async operation and record it on every exit path.
	 *
	 * Resolves with `fn`'s result. When `fn` throws or rejects, the sample is
	 * still recorded and the original error is rethrown.
	 *
	 * @throws InvalidInputError for a blank operation, before `fn` runs
	 */
	async trackOperation<T>(
		operation: string,
		fn: () => Promise<T>,
		options: SampleOptions = {},
	): Promise<T> {
		validateOperation(operation)
		const start = this.clock()

		let result: T
		try {
			result = await fn()
		} catch (error: unknown) {
			this.recordFailure(operation, this.elapsedSince(start), options, error)
			throw error
		}

		this.record(operation, this.elapsedSince(start), options)
		return result
	}

	/**
	 * Synchronous version of {@link trackOperation}.
	 */
	trackOperationSync<T>(
		operation: string,
		fn: () => T,
		options: SampleOptions = {},
	): T {
		validateOperation(operation)
		const start = this.clock()

		let result: T
		try {
			result = fn()
		} catch (error: unknown) {
			this.recordFailure(operation, this.elapsedSince(start), options, error)
			throw error
		}

		this.record(operation, this.elapsedSince(start), options)
		return result
	}

	/**
	 * Buffered samples, oldest first.
	 *
	 * Filters apply in order: operation, since, then limit.
	 *
	 * @throws InvalidInputError when `limit` is negative or not an integer
	 */
	getMetrics(query: MetricsQuery = {}): PerformanceSample[] {
		const { operation, since, limit } = query
		if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
			throw new InvalidInputError(
				`Limit must be a non-negative integer, got ${limit}`,
				'INVALID_LIMIT',
				{ limit },
			)
		}

		let samples = this.buffer.snapshot()
		if (operation) {
			samples = samples.filter((sample) => sample.operation === operation)
		}
		if (since) {
			const from = since.getTime()
			samples = samples.filter((sample) => sample.timestamp.getTime() >= from)
		}
		if (limit) {
			samples = samples.slice(-limit)
		}
		return samples
	}

	/**
	 * Summarize the durations of the matching samples.
	 */
	getStatistics(query: StatisticsQuery = {}): PerformanceStatistics {
		return computeStatistics(
			this.getMetrics(query).map((sample) => sample.duration),
		)
	}

	clearMetrics(): void {
		this.buffer.clear()
	}

	private elapsedSince(start: number): number {
		return Math.max(0, this.clock() - start) / 1000
	}

	private recordFailure(
		operation: string,
		duration: number,
		options: SampleOptions,
		cause: unknown,
	): void {
		try {
			this.record(operation, duration, options)
		} catch (sinkError: unknown) {
			getLogger([...META_CATEGORY]).warning(
				'Failed to log performance sample of a failed operation',
				{ operation, error: sinkError, cause },
			)
		}
	}

	private emit(sample: PerformanceSample): void {
		const attributes: Record<string, unknown> = {
			operation: sample.operation,
			duration_ms: sample.durationMs,
			duration_seconds: sample.duration,
			timestamp: sample.timestamp.toISOString(),
			...sample.context,
		}

		if (sample.userId !== undefined) attributes.user_id = sample.userId
		if (sample.sessionId !== undefined) attributes.session_id = sample.sessionId
		if (sample.requestId !== undefined) attributes.request_id = sample.requestId
		if (this.config.trackMemory) attributes.memory = captureMemory()
		if (this.config.trackCpu) attributes.cpu = captureCpu()

		this.logger.info(
			`Performance: ${escapeMessageTemplate(sample.operation)} took ${sample.duration.toFixed(3)}s`,
			attributes,
		)
	}
}
