import chalk from 'chalk';
import type {SkillDocument} from '../../infra/skills/types';
import type {SkillQueryResult} from './types';

export type FormatListingOptions = {
	color: boolean;
};

type Palette = {
	header: (s: string) => string;
	name: (s: string) => string;
	dim: (s: string) => string;
};

const PLAIN: Palette = {
	header: s => s,
	name: s => s,
	dim: s => s,
};

const COLORED: Palette = {
	header: chalk.bold,
	name: chalk.cyan,
	dim: chalk.dim,
};

/**
 * Render a query result as a flat listing with one section per category:
 *
 *   ## analysis
 *
 *   - code-archaeology [analysis/code-archaeology]: Map an unfamiliar system
 *     When to use: Working in a legacy codebase
 */
export function formatSkillListing(
	result: SkillQueryResult,
	options: FormatListingOptions = {color: false},
): string {
	if (result.total === 0) {
		return result.pattern === undefined
			? 'No skills found.'
			: `No skills found matching "${result.pattern}".`;
	}

	const paint = options.color ? COLORED : PLAIN;

	return result.groups
		.map(group =>
			[
				paint.header(`## ${group.category}`),
				'',
				...group.skills.flatMap(skill => formatSkill(skill, paint)),
			].join('\n'),
		)
		.join('\n\n');
}

function formatSkill(skill: SkillDocument, paint: Palette): string[] {
	const {metadata} = skill;
	const version = metadata.version ? ` v${metadata.version}` : '';
	const lines = [
		`- ${paint.name(metadata.name)}${version} ${paint.dim(`[${skill.id}]`)}: ${singleLine(metadata.description)}`,
		`  ${paint.dim('When to use:')} ${singleLine(metadata.when_to_use)}`,
	];

	const languages = metadata.languages;
	if (languages && !languages.includes('all')) {
		lines.push(`  ${paint.dim('Languages:')} ${languages.join(', ')}`);
	}

	return lines;
}

function singleLine(text: string): string {
	return text.replace(/\s+/g, ' ').trim();
}

/**
 * JSON-friendly view of a query result. Bodies are left out; they are
 * fetched per skill.
 */
export function toCatalogJson(result: SkillQueryResult): {
	pattern: string | null;
	total: number;
	categories: Array<{
		category: string;
		skills: Array<{
			id: string;
			name: string;
			description: string;
			when_to_use: string;
			version: string | null;
			languages: string[] | null;
			path: string;
		}>;
	}>;
} {
	return {
		pattern: result.pattern ?? null,
		total: result.total,
		categories: result.groups.map(group => ({
			category: group.category,
			skills: group.skills.map(skill => ({
				id: skill.id,
				name: skill.metadata.name,
				description: skill.metadata.description,
				when_to_use: skill.metadata.when_to_use,
				version: skill.metadata.version ?? null,
				languages: skill.metadata.languages ?? null,
				path: skill.path,
			})),
		})),
	};
}
