import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

export type SkillFields = {
	name?: string;
	description?: string;
	when_to_use?: string;
	[key: string]: string | undefined;
};

/** Render a SKILL.md with one `key: value` line per defined field. */
export function skillText(fields: SkillFields, body = 'Body.\n'): string {
	const header = Object.entries(fields)
		.filter((entry): entry is [string, string] => entry[1] !== undefined)
		.map(([key, value]) => `${key}: ${value}`);
	return ['---', ...header, '---', body].join('\n');
}

export function makeSkillsRoot(): string {
	return fs.mkdtempSync(path.join(os.tmpdir(), 'skills-test-'));
}

/** Write `{root}/{id}/SKILL.md` and return its path. */
export function writeSkill(root: string, id: string, content: string): string {
	const dir = path.join(root, ...id.split('/'));
	fs.mkdirSync(dir, {recursive: true});
	const filePath = path.join(dir, 'SKILL.md');
	fs.writeFileSync(filePath, content, 'utf-8');
	return filePath;
}

export function validSkill(
	name: string,
	overrides: SkillFields = {},
	body?: string,
): string {
	return skillText(
		{
			name,
			description: `Description of ${name}`,
			when_to_use: `When ${name} applies`,
			...overrides,
		},
		body,
	);
}
