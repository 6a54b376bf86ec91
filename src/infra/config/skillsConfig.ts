/**
 * Skills config reader.
 *
 * Resolves the configuration root, the skills root, the introductory
 * document and the hook debug log from environment variables. Entry
 * points call this once at startup and pass the result down.
 *
 *   SKILLS_CONFIG_ROOT  default ~/.claude
 *   SKILLS_ROOT         default {configRoot}/skills
 *   SKILLS_INTRO_DOC    default {skillsRoot}/using-skills/SKILL.md
 *   SKILLS_HOOK_LOG     default {tmpdir}/skills-hook-debug.log
 *   SKILLS_DEBUG        enabled unless empty, 0, false, no or off
 */

import os from 'node:os';
import path from 'node:path';

export type SkillsConfig = {
	configRoot: string;
	skillsRoot: string;
	/** Introduction injected at session start. */
	introDocumentPath: string;
	/** Append-only hook log; never read back. */
	debugLogPath: string;
	debug: boolean;
};

const INTRO_SKILL_ID = 'using-skills';

type Env = Record<string, string | undefined>;

export function readSkillsConfig(
	env: Env = process.env,
	homeDir: string = os.homedir(),
	tmpDir: string = os.tmpdir(),
): SkillsConfig {
	const configRoot = resolvePath(
		readVar(env, 'SKILLS_CONFIG_ROOT') ?? path.join(homeDir, '.claude'),
		homeDir,
	);
	const skillsRoot = resolvePath(
		readVar(env, 'SKILLS_ROOT') ?? path.join(configRoot, 'skills'),
		homeDir,
	);
	const introDocumentPath = resolvePath(
		readVar(env, 'SKILLS_INTRO_DOC') ??
			path.join(skillsRoot, INTRO_SKILL_ID, 'SKILL.md'),
		homeDir,
	);
	const debugLogPath = resolvePath(
		readVar(env, 'SKILLS_HOOK_LOG') ??
			path.join(tmpDir, 'skills-hook-debug.log'),
		homeDir,
	);

	return {
		configRoot,
		skillsRoot,
		introDocumentPath,
		debugLogPath,
		debug: isTruthy(readVar(env, 'SKILLS_DEBUG')),
	};
}

function readVar(env: Env, name: string): string | undefined {
	const value = env[name]?.trim();
	return value ? value : undefined;
}

/** Expand `~` and resolve relative paths against the home directory. */
function resolvePath(p: string, homeDir: string): string {
	if (p === '~') return homeDir;
	if (p.startsWith('~/')) return path.join(homeDir, p.slice(2));
	return path.isAbsolute(p) ? path.normalize(p) : path.resolve(homeDir, p);
}

function isTruthy(value: string | undefined): boolean {
	if (value === undefined) return false;
	return !['0', 'false', 'no', 'off'].includes(value.toLowerCase());
}
