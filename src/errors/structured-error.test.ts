import { describe, expect, test } from 'vitest'
import {
	ConfigurationError,
	InvalidInputError,
	isStructuredError,
	StructuredError,
} from './structured-error'

describe('StructuredError', () => {
	test('creates error with all properties', () => {
		const error = new StructuredError(
			'Rotation size must be positive',
			'CONFIGURATION',
			'INVALID_CONFIG',
			{ maxBytes: 0 },
		)

		expect(error).toBeInstanceOf(Error)
		expect(error.message).toBe('Rotation size must be positive')
		expect(error.category).toBe('CONFIGURATION')
		expect(error.code).toBe('INVALID_CONFIG')
		expect(error.context).toEqual({ maxBytes: 0 })
		expect(error.name).toBe('StructuredError')
		expect(error.stack).toBeDefined()
	})

	test('defaults context to an empty object', () => {
		const error = new StructuredError('Minimal', 'VALIDATION', 'MINIMAL')

		expect(error.context).toEqual({})
		expect(error.cause).toBeUndefined()
	})

	test('toJSON includes cause summary', () => {
		const cause = new Error('disk full')
		const error = new ConfigurationError(
			'Cannot open log file',
			'INVALID_CONFIG',
			{ path: '/tmp/x.log' },
			cause,
		)

		const json = error.toJSON()
		expect(json.name).toBe('ConfigurationError')
		expect(json.category).toBe('CONFIGURATION')
		expect(json.code).toBe('INVALID_CONFIG')
		expect(json.context).toEqual({ path: '/tmp/x.log' })
		expect(json.cause).toEqual({ name: 'Error', message: 'disk full' })
	})
})

describe('InvalidInputError', () => {
	test('is a VALIDATION structured error', () => {
		const error = new InvalidInputError('bad duration', 'INVALID_DURATION', {
			duration: -1,
		})

		expect(isStructuredError(error)).toBe(true)
		expect(error).toBeInstanceOf(InvalidInputError)
		expect(error.category).toBe('VALIDATION')
		expect(error.name).toBe('InvalidInputError')
		expect(error.context).toEqual({ duration: -1 })
	})

	test('isStructuredError rejects plain errors', () => {
		expect(isStructuredError(new Error('plain'))).toBe(false)
		expect(isStructuredError('string')).toBe(false)
	})
})
