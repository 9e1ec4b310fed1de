import { describe, expect, test } from 'vitest'
import { computeStatistics, EMPTY_STATISTICS, percentile } from './statistics'

describe('percentile', () => {
	const tens = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10]

	test('selects sorted[floor(count * p)]', () => {
		expect(percentile(tens, 0.5)).toBe(6)
		expect(percentile(tens, 0.95)).toBe(10)
		expect(percentile(tens, 0.99)).toBe(10)
		expect(percentile(tens, 0)).toBe(1)
	})

	test('clamps to the maximum past the end', () => {
		expect(percentile(tens, 1)).toBe(10)
		expect(percentile([7], 0.99)).toBe(7)
	})

	test('returns 0 for no values', () => {
		expect(percentile([], 0.95)).toBe(0)
	})
})

describe('computeStatistics', () => {
	test('returns zeros for no durations', () => {
		expect(computeStatistics([])).toEqual(EMPTY_STATISTICS)
	})

	test('summarizes 1, 2, 3', () => {
		expect(computeStatistics([1, 2, 3])).toEqual({
			count: 3,
			totalDuration: 6,
			avgDuration: 2,
			minDuration: 1,
			maxDuration: 3,
			p95Duration: 3,
			p99Duration: 3,
		})
	})

	test('sorts unordered input', () => {
		const stats = computeStatistics([3, 0.5, 2, 8])

		expect(stats.minDuration).toBe(0.5)
		expect(stats.maxDuration).toBe(8)
		expect(stats.totalDuration).toBe(13.5)
		expect(stats.avgDuration).toBe(3.375)
	})

	test('does not reorder the input', () => {
		const durations = [3, 1, 2]
		computeStatistics(durations)

		expect(durations).toEqual([3, 1, 2])
	})

	test('uses nearest-rank-floor for larger sets', () => {
		const stats = computeStatistics([10, 9, 8, 7, 6, 5, 4, 3, 2, 1])

		expect(stats.p95Duration).toBe(10)
		expect(stats.p99Duration).toBe(10)
	})
})
