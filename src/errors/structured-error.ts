/**
 * Structured errors for the logging facade.
 *
 * Every error raised by this package carries:
 * - A category for coarse classification
 * - A machine-readable code
 * - Context metadata describing the offending value
 * - JSON serialization so the error itself can be logged as a property
 *
 * @module errors/structured-error
 */

/**
 * Error categories raised by this package.
 */
export type ErrorCategory =
	| 'VALIDATION' // A call received a malformed argument
	| 'CONFIGURATION' // A configuration record failed to parse or is incomplete

/**
 * Base class for categorized errors.
 *
 * @example
 * ```typescript
 * throw new StructuredError(
 *   "Rotation size must be positive",
 *   "CONFIGURATION",
 *   "INVALID_CONFIG",
 *   { maxBytes: 0 }
 * );
 * ```
 */
export class StructuredError extends Error {
	/**
	 * High-level error category.
	 */
	public readonly category: ErrorCategory

	/**
	 * Machine-readable error code (e.g., "INVALID_DURATION").
	 */
	public readonly code: string

	/**
	 * Values that explain the failure.
	 */
	public readonly context: Record<string, unknown>

	/**
	 * Original error, when this one wraps another.
	 */
	public override readonly cause?: Error

	constructor(
		message: string,
		category: ErrorCategory,
		code: string,
		context: Record<string, unknown> = {},
		cause?: Error,
	) {
		super(message)
		this.name = 'StructuredError'
		this.category = category
		this.code = code
		this.context = context
		this.cause = cause

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, new.target)
		}
	}

	/**
	 * Serialize error to a plain object for structured log properties.
	 */
	toJSON(): {
		name: string
		message: string
		category: ErrorCategory
		code: string
		context: Record<string, unknown>
		stack?: string
		cause?: {
			name: string
			message: string
		}
	} {
		return {
			name: this.name,
			message: this.message,
			category: this.category,
			code: this.code,
			context: this.context,
			stack: this.stack,
			cause: this.cause
				? { name: this.cause.name, message: this.cause.message }
				: undefined,
		}
	}
}

/**
 * Raised synchronously when a caller passes a malformed argument.
 * Never retried: it marks a programming error at the call site.
 */
export class InvalidInputError extends StructuredError {
	constructor(message: string, code: string, context?: Record<string, unknown>) {
		super(message, 'VALIDATION', code, context)
		this.name = 'InvalidInputError'
	}
}

/**
 * Raised when a configuration record cannot be parsed or names no usable target.
 */
export class ConfigurationError extends StructuredError {
	constructor(
		message: string,
		code: string,
		context?: Record<string, unknown>,
		cause?: Error,
	) {
		super(message, 'CONFIGURATION', code, context, cause)
		this.name = 'ConfigurationError'
	}
}

/**
 * Type guard to check if an error is a StructuredError.
 */
export function isStructuredError(error: unknown): error is StructuredError {
	return error instanceof StructuredError
}
