/**
 * YAML frontmatter parser for SKILL.md files.
 *
 * Handles the subset of YAML used in skill frontmatter:
 * - Plain `key: value` strings (surrounding quotes stripped)
 * - Folded scalars (`key: >`) and literal scalars (`key: |`)
 * - Booleans (`true` / `false`)
 * - String arrays (lines starting with `  - `, or inline `[a, b]`)
 *
 * Never throws; a malformed document comes back as `{ok: false}` with the
 * reason.
 */

import {
	type FrontmatterValue,
	type ParseResult,
	type SkillMetadata,
} from './types';

export const SKILL_DOCUMENT_FILENAME = 'SKILL.md';

const DELIMITER = '---';

const KNOWN_KEYS = new Set([
	'name',
	'description',
	'when_to_use',
	'version',
	'languages',
	'allowed-tools',
	'run',
]);

/**
 * Parse a SKILL.md file into metadata + body.
 *
 * The body is everything after the closing `---` line, byte-for-byte.
 */
export function parseSkillDocument(
	content: string,
	filePath: string,
): ParseResult {
	const split = splitFrontmatter(content);
	if (typeof split === 'string') {
		return fail(filePath, split);
	}

	const fields = parseYaml(split.yamlLines);

	const name = readRequired(fields, 'name');
	if (name === undefined) return missingField(filePath, 'name');
	const description = readRequired(fields, 'description');
	if (description === undefined) return missingField(filePath, 'description');
	const whenToUse = readRequired(fields, 'when_to_use');
	if (whenToUse === undefined) return missingField(filePath, 'when_to_use');

	const extra = Object.fromEntries(
		Object.entries(fields).filter(([key]) => !KNOWN_KEYS.has(key)),
	);
	const version = fields['version'];
	const run = fields['run'];

	const metadata: SkillMetadata = {
		name,
		description,
		when_to_use: whenToUse,
		extra,
	};

	if (typeof version === 'string' && version !== '') {
		metadata.version = version;
	}

	const languageList = normalizeLanguages(fields['languages']);
	if (languageList) {
		metadata.languages = languageList;
	}

	const toolList = toList(fields['allowed-tools']);
	if (toolList.length > 0) {
		metadata['allowed-tools'] = toolList;
	}

	if (typeof run === 'string' && run !== '') {
		metadata.run = run;
	}

	return {ok: true, document: {metadata, body: split.body}};
}

function fail(path: string, reason: string): ParseResult {
	return {ok: false, error: {path, reason}};
}

function missingField(path: string, key: string): ParseResult {
	return fail(
		path,
		`SKILL.md frontmatter must include a non-empty "${key}" field`,
	);
}

function readRequired(
	fields: Record<string, FrontmatterValue>,
	key: string,
): string | undefined {
	const value = fields[key];
	if (typeof value !== 'string' || value.trim() === '') return undefined;
	return value;
}

type SplitDocument = {
	yamlLines: string[];
	body: string;
};

/**
 * Split raw text at the frontmatter delimiters. Returns the failure reason
 * as a string when the header is absent or unterminated.
 */
function splitFrontmatter(content: string): SplitDocument | string {
	const text = content.startsWith('\uFEFF') ? content.slice(1) : content;
	const yamlLines: string[] = [];
	let lineStart = 0;
	let lineIndex = 0;

	for (;;) {
		const newline = text.indexOf('\n', lineStart);
		const lineEnd = newline === -1 ? text.length : newline;
		const line = text.slice(lineStart, lineEnd);
		const nextStart = newline === -1 ? text.length : newline + 1;

		if (line.trimEnd() === DELIMITER) {
			if (lineIndex > 0) {
				return {yamlLines, body: text.slice(nextStart)};
			}
		} else if (lineIndex === 0) {
			return 'SKILL.md must start with --- frontmatter delimiter';
		} else {
			yamlLines.push(line.endsWith('\r') ? line.slice(0, -1) : line);
		}

		if (newline === -1) {
			return 'SKILL.md missing closing --- frontmatter delimiter';
		}

		lineStart = nextStart;
		lineIndex++;
	}
}

const LIST_ITEM = /^\s*-(\s+|$)/;

/**
 * Parse the simple YAML subset used in skill frontmatter.
 */
function parseYaml(lines: string[]): Record<string, FrontmatterValue> {
	const result: Record<string, FrontmatterValue> = {};
	let i = 0;

	while (i < lines.length) {
		const line = lines[i] ?? '';

		// Skip blank lines, comments and stray indented lines
		if (line.trim() === '' || line.startsWith('#') || /^\s/.test(line)) {
			i++;
			continue;
		}

		const colonIdx = line.indexOf(':');
		if (colonIdx === -1) {
			i++;
			continue;
		}

		const key = line.slice(0, colonIdx).trim();
		const rawValue = line.slice(colonIdx + 1).trim();

		if (/^[>|]-?$/.test(rawValue)) {
			// Block scalar: collect indented (or blank) continuation lines
			const block: string[] = [];
			i++;
			while (i < lines.length) {
				const next = lines[i] ?? '';
				if (next.trim() !== '' && !/^\s/.test(next)) break;
				block.push(next);
				i++;
			}
			result[key] = rawValue.startsWith('>')
				? foldBlock(block)
				: literalBlock(block);
			continue;
		}

		if (rawValue === '') {
			// String array if the next lines are `  - item`
			const items: string[] = [];
			i++;
			while (i < lines.length && LIST_ITEM.test(lines[i] ?? '')) {
				const item = stripQuotes(
					(lines[i] ?? '').replace(LIST_ITEM, '').trim(),
				);
				if (item !== '') items.push(item);
				i++;
			}
			result[key] = items.length > 0 ? items : '';
			continue;
		}

		if (rawValue.startsWith('[') && rawValue.endsWith(']')) {
			result[key] = parseInlineArray(rawValue);
			i++;
			continue;
		}

		// Boolean
		if (rawValue === 'true' || rawValue === 'false') {
			result[key] = rawValue === 'true';
			i++;
			continue;
		}

		// Plain string value
		result[key] = stripQuotes(rawValue);
		i++;
	}

	return result;
}

function foldBlock(block: string[]): string {
	return block
		.map(line => line.trim())
		.filter(line => line !== '')
		.join(' ');
}

function literalBlock(block: string[]): string {
	const indents = block
		.filter(line => line.trim() !== '')
		.map(line => line.length - line.trimStart().length);
	const indent = indents.length > 0 ? Math.min(...indents) : 0;
	return block
		.map(line => line.slice(indent))
		.join('\n')
		.trimEnd();
}

function parseInlineArray(raw: string): string[] {
	const inner = raw.slice(1, -1).trim();
	if (!inner) return [];
	return inner
		.split(',')
		.map(item => stripQuotes(item.trim()))
		.filter(item => item !== '');
}

function stripQuotes(value: string): string {
	if (
		value.length >= 2 &&
		((value.startsWith('"') && value.endsWith('"')) ||
			(value.startsWith("'") && value.endsWith("'")))
	) {
		return value.slice(1, -1);
	}
	return value;
}

function toList(value: FrontmatterValue | undefined): string[] {
	if (Array.isArray(value)) return value;
	if (typeof value !== 'string') return [];
	return value
		.split(',')
		.map(item => item.trim())
		.filter(item => item !== '');
}

function normalizeLanguages(
	value: FrontmatterValue | undefined,
): string[] | undefined {
	const languages = [
		...new Set(toList(value).map(language => language.toLowerCase())),
	];
	return languages.length > 0 ? languages : undefined;
}
