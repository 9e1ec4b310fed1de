import { readFileSync } from 'node:fs'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { ConsoleHandlerConfigSchema, LogConfigSchema } from '../config'
import { ConfigurationError } from '../errors'
import { createTextFormatter } from '../formatters'
import {
	createLogRecord,
	createTempDir,
	MemoryStream,
	removeTempDir,
} from '../testing'
import {
	buildHandlerSinks,
	createConsoleSink,
	createRotatingFileSink,
	createStreamSink,
	filterSink,
	resolveLogFilePath,
} from './sinks'

describe('createStreamSink', () => {
	test('writes formatted records', () => {
		const stream = new MemoryStream()
		const sink = createStreamSink(
			stream,
			createTextFormatter({ includeTimestamp: false }),
		)

		sink(createLogRecord())

		expect(stream.text).toBe('app - INFO - hello\n')
	})
})

describe('filterSink', () => {
	test('drops records below the level and forwards disposal', () => {
		const received: string[] = []
		let disposed = false
		const inner = Object.assign(
			(record: ReturnType<typeof createLogRecord>) => {
				received.push(record.level)
			},
			{
				[Symbol.dispose]: () => {
					disposed = true
				},
			},
		)

		const sink = filterSink(inner, 'warning')
		sink(createLogRecord({ level: 'info' }))
		sink(createLogRecord({ level: 'error' }))
		sink[Symbol.dispose]()

		expect(received).toEqual(['error'])
		expect(disposed).toBe(true)
	})
})

describe('createConsoleSink', () => {
	test('routes to stderr and filters by handler level', () => {
		const stdout = new MemoryStream()
		const stderr = new MemoryStream()
		const config = ConsoleHandlerConfigSchema.parse({
			stream: 'stderr',
			level: 'warning',
		})

		const sink = createConsoleSink(
			config,
			{ includeTimestamp: false },
			{ stdout, stderr },
		)
		sink(createLogRecord({ level: 'info', message: 'quiet' }))
		sink(createLogRecord({ level: 'error', message: 'loud' }))

		expect(stdout.chunks).toEqual([])
		expect(stderr.text).toBe('app - ERROR - loud\n')
	})

	test('uses the configured format', () => {
		const stdout = new MemoryStream()
		const config = ConsoleHandlerConfigSchema.parse({ format: 'json' })

		createConsoleSink(config, {}, { stdout })(createLogRecord())

		expect(JSON.parse(stdout.text).message).toBe('hello')
	})
})

describe('resolveLogFilePath', () => {
	test('prefers filename', () => {
		expect(
			resolveLogFilePath({ filename: '/a/b.log', directory: '/c' }, 'svc'),
		).toBe('/a/b.log')
	})

	test('falls back to directory and name', () => {
		expect(resolveLogFilePath({ directory: '/c' }, 'svc')).toBe(
			join('/c', 'svc.log'),
		)
	})

	test('throws without either', () => {
		expect(() => resolveLogFilePath({}, 'svc')).toThrow(ConfigurationError)
	})
})

describe('file sinks', () => {
	let tempDir: string

	beforeEach(() => {
		tempDir = createTempDir('tracelight-sinks-')
	})

	afterEach(() => {
		removeTempDir(tempDir)
	})

	test('createRotatingFileSink creates missing directories', () => {
		const path = join(tempDir, 'nested', 'deeper', 'app.log')
		const sink = createRotatingFileSink(path, {
			formatter: createTextFormatter({ includeTimestamp: false }),
			level: 'info',
		})

		sink(createLogRecord({ level: 'debug', message: 'skipped' }))
		sink(createLogRecord({ message: 'kept' }))
		sink[Symbol.dispose]()

		expect(readFileSync(path, 'utf8')).toBe('app - INFO - kept\n')
	})

	test('buildHandlerSinks returns only enabled handlers', () => {
		const consoleOnly = buildHandlerSinks(LogConfigSchema.parse({}), 'svc')
		expect(Object.keys(consoleOnly)).toEqual(['console'])

		const both = buildHandlerSinks(
			LogConfigSchema.parse({ file: { directory: tempDir } }),
			'svc',
		)
		expect(Object.keys(both)).toEqual(['console', 'file'])
		both.file?.[Symbol.dispose]()

		const none = buildHandlerSinks(
			LogConfigSchema.parse({ console: { enabled: false } }),
			'svc',
		)
		expect(none).toEqual({})
	})
})
