/**
 * Application-level holder of the performance tracker.
 *
 * A {@link PerformanceContext} owns at most one tracker. Code that needs one
 * either receives a context (or tracker) explicitly, or goes through the
 * narrow accessors below, which use a single process default context.
 *
 * @example
 * ```typescript
 * setupPerformanceLogging({ config: { thresholdMs: 250 } });
 *
 * await trackPerformance("render", () => renderPage(), { userId: "u-1" });
 * getPerformanceTracker().getStatistics({ operation: "render" });
 * ```
 *
 * @module performance/context
 */

import type { SampleOptions } from './sample.ts'
import { PerformanceTracker, type PerformanceTrackerOptions } from './tracker.ts'

export class PerformanceContext {
	private readonly defaults: PerformanceTrackerOptions
	private tracker: PerformanceTracker | undefined

	/**
	 * @param defaults - Options for the tracker created by {@link getTracker}
	 */
	constructor(defaults: PerformanceTrackerOptions = {}) {
		this.defaults = defaults
	}

	/** Whether a tracker currently exists */
	get initialized(): boolean {
		return this.tracker !== undefined
	}

	/**
	 * The current tracker, created from the defaults on first use.
	 */
	getTracker(): PerformanceTracker {
		if (!this.tracker) {
			this.tracker = new PerformanceTracker(this.defaults)
		}
		return this.tracker
	}

	/**
	 * Replace the tracker. The previous tracker and its samples are discarded.
	 */
	setup(options: PerformanceTrackerOptions = {}): PerformanceTracker {
		this.tracker = new PerformanceTracker({ ...this.defaults, ...options })
		return this.tracker
	}

	/**
	 * Drop the tracker; the next {@link getTracker} starts empty.
	 */
	reset(): void {
		this.tracker = undefined
	}
}

let defaultContext: PerformanceContext | undefined

export function getDefaultPerformanceContext(): PerformanceContext {
	if (!defaultContext) {
		defaultContext = new PerformanceContext()
	}
	return defaultContext
}

export function getPerformanceTracker(): PerformanceTracker {
	return getDefaultPerformanceContext().getTracker()
}

/**
 * Replace the default tracker, discarding its samples.
 */
export function setupPerformanceLogging(
	options: PerformanceTrackerOptions = {},
): PerformanceTracker {
	return getDefaultPerformanceContext().setup(options)
}

export function resetPerformanceTracker(): void {
	getDefaultPerformanceContext().reset()
}

/**
 * Record a sample on the default tracker.
 *
 * @param duration - Seconds
 */
export function logPerformance(
	operation: string,
	duration: number,
	options: SampleOptions = {},
): void {
	getPerformanceTracker().record(operation, duration, options)
}

/**
 * Time `fn` on the default tracker.
 */
export function trackPerformance<T>(
	operation: string,
	fn: () => Promise<T>,
	options: SampleOptions = {},
): Promise<T> {
	return getPerformanceTracker().trackOperation(operation, fn, options)
}
