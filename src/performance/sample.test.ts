import { describe, expect, test } from 'vitest'
import { PerformanceSample } from './sample'

const timestamp = new Date(Date.UTC(2025, 0, 2, 3, 4, 5, 678))

describe('PerformanceSample', () => {
	test('derives milliseconds from seconds', () => {
		for (const duration of [0, 0.001, 0.25, 1.5, 42.123]) {
			const sample = new PerformanceSample({ operation: 'op', duration, timestamp })
			expect(sample.durationMs).toBe(duration * 1000)
		}
	})

	test('defaults to an empty context and no correlation IDs', () => {
		const sample = new PerformanceSample({ operation: 'op', duration: 1, timestamp })

		expect(sample.context).toEqual({})
		expect(sample.userId).toBeUndefined()
		expect('userId' in sample).toBe(false)
	})

	test('is frozen', () => {
		const sample = new PerformanceSample({
			operation: 'op',
			duration: 1,
			timestamp,
			context: { table: 'users' },
		})

		expect(Object.isFrozen(sample)).toBe(true)
		expect(Object.isFrozen(sample.context)).toBe(true)
	})

	test('copies the timestamp and context', () => {
		const source = new Date(timestamp.getTime())
		const context: Record<string, string> = { table: 'users' }
		const sample = new PerformanceSample({
			operation: 'op',
			duration: 1,
			timestamp: source,
			context,
		})

		source.setUTCFullYear(2000)
		context.table = 'orders'

		expect(sample.timestamp.toISOString()).toBe('2025-01-02T03:04:05.678Z')
		expect(sample.context).toEqual({ table: 'users' })
	})

	test('copies and freezes nested context values', () => {
		const db = { table: 'users' }
		const shards = [1, 2]
		const sample = new PerformanceSample({
			operation: 'op',
			duration: 1,
			timestamp,
			context: { db, shards },
		})

		db.table = 'orders'
		shards.push(3)

		expect(sample.context).toEqual({ db: { table: 'users' }, shards: [1, 2] })
		expect(Object.isFrozen(sample.context.db)).toBe(true)
		expect(Object.isFrozen(sample.context.shards)).toBe(true)
	})
})
