/**
 * Process resource snapshots attached to emitted performance lines.
 *
 * @module performance/resources
 */

const BYTES_PER_MB = 1024 * 1024

/**
 * Process memory usage, rounded to whole megabytes.
 */
export interface MemorySnapshot {
	heapUsedMB: number
	heapTotalMB: number
	/** Memory used by C++ objects bound to JavaScript */
	externalMB: number
	/** Resident Set Size: total memory allocated for the process */
	rssMB: number
}

/**
 * CPU time consumed by the process since it started.
 */
export interface CpuSnapshot {
	userMs: number
	systemMs: number
}

/**
 * Capture current process memory usage.
 *
 * @example
 * ```typescript
 * const memory = captureMemory();
 * console.log(`Heap: ${memory.heapUsedMB}MB / ${memory.heapTotalMB}MB`);
 * ```
 */
export function captureMemory(): MemorySnapshot {
	const mem = process.memoryUsage()
	return {
		heapUsedMB: Math.round(mem.heapUsed / BYTES_PER_MB),
		heapTotalMB: Math.round(mem.heapTotal / BYTES_PER_MB),
		externalMB: Math.round(mem.external / BYTES_PER_MB),
		rssMB: Math.round(mem.rss / BYTES_PER_MB),
	}
}

/**
 * Capture process CPU time (microseconds from `process.cpuUsage()` as ms).
 */
export function captureCpu(): CpuSnapshot {
	const { user, system } = process.cpuUsage()
	return { userMs: user / 1000, systemMs: system / 1000 }
}
