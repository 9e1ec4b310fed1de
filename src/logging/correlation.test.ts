import { describe, expect, test } from 'vitest'
import { createCorrelationId } from './correlation'

describe('createCorrelationId', () => {
	test('returns 8 hex characters', () => {
		expect(createCorrelationId()).toMatch(/^[a-f0-9]{8}$/)
	})

	test('generates unique IDs', () => {
		const ids = new Set<string>()
		for (let i = 0; i < 100; i++) {
			ids.add(createCorrelationId())
		}

		expect(ids.size).toBe(100)
	})
})
