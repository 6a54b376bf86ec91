import {describe, it, expect} from 'vitest';
import stripAnsi from 'strip-ansi';
import {formatSkillListing, toCatalogJson} from './format';
import {querySkills} from './query';
import {makeDocument, makeRegistry} from './__tests__/documents';

const registry = makeRegistry([
	makeDocument('testing/tdd', {
		name: 'tdd',
		description: 'Write the failing test first',
		when_to_use: 'Implementing any feature\nor bugfix',
		version: '1.2.0',
	}),
	makeDocument('analysis/code-archaeology', {
		name: 'code-archaeology',
		description: 'Map an unfamiliar system',
		when_to_use: 'Working in a legacy codebase',
		languages: ['python', 'go'],
	}),
	makeDocument('analysis/any-language', {
		name: 'any-language',
		description: 'Works everywhere',
		when_to_use: 'Always',
		languages: ['all'],
	}),
]);

describe('formatSkillListing', () => {
	it('renders one section per category', () => {
		expect(formatSkillListing(querySkills(registry))).toBe(
			[
				'## analysis',
				'',
				'- any-language [analysis/any-language]: Works everywhere',
				'  When to use: Always',
				'- code-archaeology [analysis/code-archaeology]: Map an unfamiliar system',
				'  When to use: Working in a legacy codebase',
				'  Languages: python, go',
				'',
				'## testing',
				'',
				'- tdd v1.2.0 [testing/tdd]: Write the failing test first',
				'  When to use: Implementing any feature or bugfix',
			].join('\n'),
		);
	});

	it('reports an empty root', () => {
		expect(formatSkillListing(querySkills(makeRegistry([])))).toBe(
			'No skills found.',
		);
	});

	it('names the pattern when nothing matches', () => {
		expect(formatSkillListing(querySkills(registry, {pattern: 'rust'}))).toBe(
			'No skills found matching "rust".',
		);
	});

	it('adds ANSI styling only when color is on', () => {
		const result = querySkills(registry, {pattern: 'tdd'});

		const plain = formatSkillListing(result, {color: false});
		const colored = formatSkillListing(result, {color: true});

		expect(plain).not.toContain('\u001B[');
		expect(stripAnsi(colored)).toBe(plain);
	});
});

describe('toCatalogJson', () => {
	it('lists metadata without bodies', () => {
		const json = toCatalogJson(querySkills(registry, {pattern: 'legacy'}));

		expect(json).toEqual({
			pattern: 'legacy',
			total: 1,
			categories: [
				{
					category: 'analysis',
					skills: [
						{
							id: 'analysis/code-archaeology',
							name: 'code-archaeology',
							description: 'Map an unfamiliar system',
							when_to_use: 'Working in a legacy codebase',
							version: null,
							languages: ['python', 'go'],
							path: '/skills/analysis/code-archaeology/SKILL.md',
						},
					],
				},
			],
		});
	});

	it('uses null for an unfiltered pattern', () => {
		expect(toCatalogJson(querySkills(makeRegistry([])))).toEqual({
			pattern: null,
			total: 0,
			categories: [],
		});
	});
});
