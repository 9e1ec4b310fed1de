/**
 * Record formatters for LogTape sinks.
 *
 * @module formatters
 */

import type { TextFormatter } from '@logtape/logtape'
import type { LogFormat } from '../logging/config.ts'
import { createJsonFormatter, createStructuredFormatter } from './json.ts'
import {
	createColoredFormatter,
	createTextFormatter,
	type TextFormatterOptions,
} from './text.ts'

export {
	createJsonFormatter,
	createStructuredFormatter,
	type JsonFormatterOptions,
} from './json.ts'
export { formatValue, jsonReplacer, renderMessage } from './record.ts'
export {
	createColoredFormatter,
	createTextFormatter,
	formatContextSuffix,
	type TextFormatterOptions,
} from './text.ts'

export interface FormatterSelection extends TextFormatterOptions {
	/** Use ANSI colours for the text format */
	colors?: boolean
}

/**
 * Pick the formatter for a configured {@link LogFormat}.
 *
 * Text options only apply to the `text` format.
 */
export function selectFormatter(
	format: LogFormat,
	options: FormatterSelection = {},
): TextFormatter {
	switch (format) {
		case 'json':
			return createJsonFormatter()
		case 'structured':
			return createStructuredFormatter()
		case 'text': {
			const { colors = false, ...textOptions } = options
			return colors
				? createColoredFormatter(textOptions)
				: createTextFormatter(textOptions)
		}
	}
}
