import {describe, it, expect} from 'vitest';
import {escapeJsonString} from './escapeJsonString';

describe('escapeJsonString', () => {
	it('escapes backslash, quote and newline', () => {
		expect(escapeJsonString('a\\b "c"\nd')).toBe('a\\\\b \\"c\\"\\nd');
	});

	it('escapes backslashes before introducing new ones', () => {
		// A literal backslash-n must stay distinguishable from a newline
		expect(escapeJsonString('\\n')).toBe('\\\\n');
		expect(escapeJsonString('\n')).toBe('\\n');
	});

	it('produces text JSON.parse reads back unchanged', () => {
		const samples = [
			'plain',
			'C:\\path\\to\\file',
			'say "hi"',
			'line one\nline two\n',
			'\\"\n\\\\',
			'unicode ✓ and emoji 📁',
		];

		for (const sample of samples) {
			expect(JSON.parse(`"${escapeJsonString(sample)}"`)).toBe(sample);
		}
	});

	it('leaves text without special characters unchanged', () => {
		expect(escapeJsonString('nothing to do here')).toBe('nothing to do here');
	});
});
