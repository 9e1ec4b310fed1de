/**
 * Append-only, in-memory sequence of samples.
 *
 * Every method is synchronous, so the event loop orders all appends, clears
 * and snapshots: none of them can observe another half-done.
 *
 * @module performance/buffer
 */

import type { PerformanceSample } from './sample.ts'

export class SampleBuffer {
	private samples: PerformanceSample[] = []

	append(sample: PerformanceSample): void {
		this.samples.push(sample)
	}

	/** Copy of the samples in recording order */
	snapshot(): PerformanceSample[] {
		return [...this.samples]
	}

	clear(): void {
		this.samples = []
	}

	get size(): number {
		return this.samples.length
	}
}
