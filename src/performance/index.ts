/**
 * Performance metric recording and statistics.
 *
 * @module performance
 */

export { SampleBuffer } from './buffer.ts'
export {
	getDefaultPerformanceContext,
	getPerformanceTracker,
	logPerformance,
	PerformanceContext,
	resetPerformanceTracker,
	setupPerformanceLogging,
	trackPerformance,
} from './context.ts'
export {
	type CpuSnapshot,
	captureCpu,
	captureMemory,
	type MemorySnapshot,
} from './resources.ts'
export {
	type ContextValue,
	PerformanceSample,
	type SampleContext,
	type SampleInit,
	type SampleOptions,
} from './sample.ts'
export {
	computeStatistics,
	EMPTY_STATISTICS,
	type PerformanceStatistics,
	percentile,
} from './statistics.ts'
export {
	type MetricsQuery,
	type PerformanceLogger,
	PerformanceTracker,
	type PerformanceTrackerOptions,
	type StatisticsQuery,
} from './tracker.ts'
