/**
 * Dedicated per-concern log files used by the aggregation presets.
 *
 * | File | Level | Format | Rotation |
 * |---|---|---|---|
 * | `errors.log` | error | structured | 5 MiB × 3 |
 * | `performance.log` | info | JSON | 5 MiB × 3 |
 * | `requests.log` | info | JSON | 10 MiB × 5 |
 */

import { join } from 'node:path'
import type { Sink } from '@logtape/logtape'
import {
	createJsonFormatter,
	createStructuredFormatter,
} from '../formatters/index.ts'
import { createRotatingFileSink } from './sinks.ts'

const MiB = 1024 * 1024

export interface DedicatedSinkOptions {
	maxBytes?: number
	backupCount?: number
}

export function createErrorSink(
	logDir: string,
	{ maxBytes = 5 * MiB, backupCount = 3 }: DedicatedSinkOptions = {},
): Sink & Disposable {
	return createRotatingFileSink(join(logDir, 'errors.log'), {
		formatter: createStructuredFormatter(),
		level: 'error',
		maxBytes,
		backupCount,
	})
}

export function createPerformanceSink(
	logDir: string,
	{ maxBytes = 5 * MiB, backupCount = 3 }: DedicatedSinkOptions = {},
): Sink & Disposable {
	return createRotatingFileSink(join(logDir, 'performance.log'), {
		formatter: createJsonFormatter(),
		level: 'info',
		maxBytes,
		backupCount,
	})
}

export function createRequestSink(
	logDir: string,
	{ maxBytes = 10 * MiB, backupCount = 5 }: DedicatedSinkOptions = {},
): Sink & Disposable {
	return createRotatingFileSink(join(logDir, 'requests.log'), {
		formatter: createJsonFormatter(),
		level: 'info',
		maxBytes,
		backupCount,
	})
}
