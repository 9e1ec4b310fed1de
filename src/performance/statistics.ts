/**
 * Summary statistics over sample durations.
 *
 * @module performance/statistics
 */

/**
 * Summary of a set of durations, all in seconds.
 */
export interface PerformanceStatistics {
	count: number
	totalDuration: number
	avgDuration: number
	minDuration: number
	maxDuration: number
	p95Duration: number
	p99Duration: number
}

export const EMPTY_STATISTICS: Readonly<PerformanceStatistics> = Object.freeze({
	count: 0,
	totalDuration: 0,
	avgDuration: 0,
	minDuration: 0,
	maxDuration: 0,
	p95Duration: 0,
	p99Duration: 0,
})

/**
 * Nearest-rank-floor percentile: `sorted[floor(count * p)]`, or the maximum
 * when that index is past the end.
 *
 * @param sorted - Values in ascending order
 * @param p - Fraction in [0, 1]
 *
 * @example
 * ```typescript
 * percentile([1, 2, 3], 0.95); // 3 (index floor(2.85) = 2)
 * percentile([1, 2, 3], 0.5);  // 2
 * ```
 */
export function percentile(sorted: readonly number[], p: number): number {
	if (sorted.length === 0) return 0
	const max = sorted[sorted.length - 1] ?? 0
	const index = Math.floor(sorted.length * p)
	return index < sorted.length ? (sorted[index] ?? max) : max
}

/**
 * Compute {@link PerformanceStatistics} for a list of durations.
 *
 * An empty list yields all zeros. The total is summed in ascending order.
 */
export function computeStatistics(
	durations: readonly number[],
): PerformanceStatistics {
	if (durations.length === 0) return { ...EMPTY_STATISTICS }

	const sorted = [...durations].sort((a, b) => a - b)
	const totalDuration = sorted.reduce((sum, value) => sum + value, 0)

	return {
		count: sorted.length,
		totalDuration,
		avgDuration: totalDuration / sorted.length,
		minDuration: sorted[0] ?? 0,
		maxDuration: sorted[sorted.length - 1] ?? 0,
		p95Duration: percentile(sorted, 0.95),
		p99Duration: percentile(sorted, 0.99),
	}
}
