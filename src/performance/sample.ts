/**
 * Performance samples: one timed observation of a named operation.
 *
 * @module performance/sample
 */

/**
 * Values allowed in a sample's context. JSON-shaped, so every sample can be
 * handed to any sink as structured attributes.
 */
export type ContextValue =
	| string
	| number
	| boolean
	| null
	| ContextValue[]
	| { [key: string]: ContextValue }

export type SampleContext = Readonly<Record<string, ContextValue>>

function freezeContextValue(value: ContextValue): void {
	if (value === null || typeof value !== 'object') return
	const children = Array.isArray(value) ? value : Object.values(value)
	for (const child of children) freezeContextValue(child)
	Object.freeze(value)
}

/**
 * Deep copy of `context`, frozen at every level.
 */
function snapshotContext(context: SampleContext = {}): SampleContext {
	const copy: { [key: string]: ContextValue } = structuredClone(context)
	freezeContextValue(copy)
	return copy
}

/**
 * Optional data attached to a sample.
 */
export interface SampleOptions {
	context?: SampleContext
	userId?: string
	sessionId?: string
	requestId?: string
}

export interface SampleInit extends SampleOptions {
	operation: string
	/** Seconds */
	duration: number
	timestamp: Date
}

/**
 * Immutable record of one timed operation.
 *
 * @example
 * ```typescript
 * const sample = new PerformanceSample({
 *   operation: "db.query",
 *   duration: 0.25,
 *   timestamp: new Date(),
 *   context: { table: "users" },
 * });
 * sample.durationMs; // 250
 * ```
 */
export class PerformanceSample {
	readonly operation: string
	/** Seconds */
	readonly duration: number
	readonly timestamp: Date
	readonly context: SampleContext
	readonly userId?: string
	readonly sessionId?: string
	readonly requestId?: string

	constructor(init: SampleInit) {
		this.operation = init.operation
		this.duration = init.duration
		this.timestamp = new Date(init.timestamp.getTime())
		this.context = snapshotContext(init.context)
		if (init.userId !== undefined) this.userId = init.userId
		if (init.sessionId !== undefined) this.sessionId = init.sessionId
		if (init.requestId !== undefined) this.requestId = init.requestId
		Object.freeze(this)
	}

	get durationMs(): number {
		return this.duration * 1000
	}
}
