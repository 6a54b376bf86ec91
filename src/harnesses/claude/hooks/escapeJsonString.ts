/**
 * Three-step JSON string escape: backslash, then double quote, then
 * newline. Backslashes go first; the later steps add backslashes of their
 * own. Tab and CR pass through unescaped.
 */
export function escapeJsonString(text: string): string {
	return text
		.replaceAll('\\', '\\\\')
		.replaceAll('"', '\\"')
		.replaceAll('\n', '\\n');
}
