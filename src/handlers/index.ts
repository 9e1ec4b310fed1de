/**
 * Handlers (LogTape sinks) for console and rotating file output.
 *
 * @module handlers
 */

export {
	createErrorSink,
	createPerformanceSink,
	createRequestSink,
	type DedicatedSinkOptions,
} from './dedicated.ts'
export {
	buildHandlerSinks,
	type ConsoleStreams,
	createConsoleSink,
	createFileSink,
	createRotatingFileSink,
	createStreamSink,
	filterSink,
	type RotatingFileSinkOptions,
	resolveLogFilePath,
	type WritableLike,
} from './sinks.ts'
