/**
 * LogTape parses a string message as a template: `{name}` is replaced by the
 * property of that name and `{{`/`}}` are literal braces.
 */

/**
 * Double every brace so caller-supplied text renders verbatim inside a
 * LogTape message template.
 *
 * @example
 * ```typescript
 * logger.info(`Performance: ${escapeMessageTemplate("GET /users/{id}")} took 0.100s`);
 * ```
 */
export function escapeMessageTemplate(text: string): string {
	return text.replace(/[{}]/g, (brace) => brace + brace)
}
