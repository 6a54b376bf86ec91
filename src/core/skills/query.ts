/**
 * Skill query engine.
 *
 * Filters a registry by an optional pattern and groups the matches by
 * category. Ordering is fully deterministic: categories ascending, names
 * ascending within each category, identifier as the final tie-break.
 */

import {compareNames} from '../../infra/skills/registry';
import type {SkillDocument, SkillRegistry} from '../../infra/skills/types';
import type {
	SkillCategoryGroup,
	SkillQuery,
	SkillQueryResult,
} from './types';

export type SkillMatcher = {
	mode: SkillQueryResult['matchMode'];
	test: (text: string) => boolean;
};

/**
 * Compile a pattern into a case-insensitive matcher. `^` and `$` anchor to
 * each field of the search text. Invalid regex syntax degrades to a
 * literal substring match instead of failing.
 */
export function compileMatcher(pattern?: string): SkillMatcher {
	if (pattern === undefined || pattern === '') {
		return {mode: 'all', test: () => true};
	}

	try {
		const regex = new RegExp(pattern, 'im');
		return {mode: 'regex', test: text => regex.test(text)};
	} catch {
		const needle = pattern.toLowerCase();
		return {mode: 'literal', test: text => text.toLowerCase().includes(needle)};
	}
}

/**
 * The text a pattern is matched against, one field per line.
 */
export function searchText(skill: SkillDocument): string {
	return [
		skill.metadata.name,
		skill.metadata.description,
		skill.metadata.when_to_use,
		skill.category,
	].join('\n');
}

/**
 * A skill with no `languages`, or with `all`, applies to every language.
 */
export function appliesToLanguage(
	skill: SkillDocument,
	language: string | undefined,
): boolean {
	const wanted = language?.trim().toLowerCase();
	if (!wanted) return true;

	const languages = skill.metadata.languages;
	if (!languages) return true;
	return languages.includes('all') || languages.includes(wanted);
}

export function querySkills(
	registry: SkillRegistry,
	query: SkillQuery = {},
): SkillQueryResult {
	const matcher = compileMatcher(query.pattern);

	const matches = [...registry.documents.values()].filter(
		skill =>
			matcher.test(searchText(skill)) &&
			appliesToLanguage(skill, query.language),
	);

	return {
		pattern: matcher.mode === 'all' ? undefined : query.pattern,
		matchMode: matcher.mode,
		groups: groupByCategory(matches),
		total: matches.length,
	};
}

export function groupByCategory(skills: SkillDocument[]): SkillCategoryGroup[] {
	const byCategory = new Map<string, SkillDocument[]>();
	for (const skill of skills) {
		const group = byCategory.get(skill.category);
		if (group) {
			group.push(skill);
		} else {
			byCategory.set(skill.category, [skill]);
		}
	}

	return [...byCategory.entries()]
		.sort(([a], [b]) => compareAlphabetical(a, b))
		.map(([category, group]) => ({
			category,
			skills: group.sort(
				(a, b) =>
					compareAlphabetical(a.metadata.name, b.metadata.name) ||
					compareNames(a.id, b.id),
			),
		}));
}

/** Case-insensitive first, code-unit order to break ties. */
function compareAlphabetical(a: string, b: string): number {
	return compareNames(a.toLowerCase(), b.toLowerCase()) || compareNames(a, b);
}
