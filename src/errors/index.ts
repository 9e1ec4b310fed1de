/**
 * Error classes raised by the logging facade.
 *
 * @module errors
 */

export {
	ConfigurationError,
	type ErrorCategory,
	InvalidInputError,
	isStructuredError,
	StructuredError,
} from './structured-error.ts'
