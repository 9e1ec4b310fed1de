import { describe, expect, test } from 'vitest'
import { RecordingLogger } from '../testing'
import { RequestLogger } from './logger'
import { createRequestMiddleware, normalizeHeaders } from './middleware'

function setup(generateRequestIds = false) {
	const sink = new RecordingLogger()
	const middleware = createRequestMiddleware({
		logger: new RequestLogger({ logger: sink, config: { logHeaders: true } }),
		generateRequestIds,
	})
	return { sink, middleware }
}

describe('normalizeHeaders', () => {
	test('joins arrays and drops missing values', () => {
		expect(
			normalizeHeaders({
				accept: 'text/html',
				'set-cookie': ['a=1', 'b=2'],
				'x-missing': undefined,
			}),
		).toEqual({ accept: 'text/html', 'set-cookie': 'a=1, b=2' })
	})
})

describe('createRequestMiddleware', () => {
	test('reads request and response fields', () => {
		const { sink, middleware } = setup()

		middleware(
			{
				method: 'POST',
				path: '/orders',
				headers: { 'User-Agent': 'test-agent/1.0', Cookie: 'sid=test' },
				clientIp: '10.0.0.1',
				userId: 'u-1',
			},
			{ statusCode: 201 },
			0.5,
			{ tenant: 't-1' },
		)

		expect(sink.calls[0]?.message).toBe('HTTP POST /orders - 201 (0.500s)')
		expect(sink.calls[0]?.properties).toEqual({
			method: 'POST',
			path: '/orders',
			status_code: 201,
			duration_ms: 500,
			duration_seconds: 0.5,
			headers: { 'User-Agent': 'test-agent/1.0' },
			user_agent: 'test-agent/1.0',
			ip_address: '10.0.0.1',
			user_id: 'u-1',
			tenant: 't-1',
		})
	})

	test('falls back to defaults for missing fields', () => {
		const { sink, middleware } = setup()

		middleware({}, {}, 0.001)

		expect(sink.calls[0]?.message).toBe('HTTP UNKNOWN / - 200 (0.001s)')
		expect(sink.calls[0]?.properties).not.toHaveProperty('request_id')
	})

	test('generates a request ID when asked', () => {
		const { sink, middleware } = setup(true)

		middleware({ path: '/' }, {}, 0.01)

		expect(sink.calls[0]?.properties.request_id).toMatch(/^[a-f0-9]{8}$/)
	})

	test('keeps an existing request ID', () => {
		const { sink, middleware } = setup(true)

		middleware({ requestId: 'req-given' }, {}, 0.01)

		expect(sink.calls[0]?.properties.request_id).toBe('req-given')
	})
})
