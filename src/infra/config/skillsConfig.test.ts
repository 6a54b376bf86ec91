import {describe, it, expect} from 'vitest';
import {readSkillsConfig} from './skillsConfig';

const HOME = '/home/tester';
const TMP = '/tmp';

describe('readSkillsConfig', () => {
	it('derives every path from the home directory by default', () => {
		expect(readSkillsConfig({}, HOME, TMP)).toEqual({
			configRoot: '/home/tester/.claude',
			skillsRoot: '/home/tester/.claude/skills',
			introDocumentPath: '/home/tester/.claude/skills/using-skills/SKILL.md',
			debugLogPath: '/tmp/skills-hook-debug.log',
			debug: false,
		});
	});

	it('derives the skills root from SKILLS_CONFIG_ROOT', () => {
		const config = readSkillsConfig(
			{SKILLS_CONFIG_ROOT: '/opt/agent'},
			HOME,
			TMP,
		);

		expect(config.skillsRoot).toBe('/opt/agent/skills');
		expect(config.introDocumentPath).toBe(
			'/opt/agent/skills/using-skills/SKILL.md',
		);
	});

	it('lets each path be overridden', () => {
		const config = readSkillsConfig(
			{
				SKILLS_ROOT: '/srv/skills/',
				SKILLS_INTRO_DOC: '/srv/intro.md',
				SKILLS_HOOK_LOG: '/var/log/hook.log',
			},
			HOME,
			TMP,
		);

		expect(config.skillsRoot).toBe('/srv/skills/');
		expect(config.introDocumentPath).toBe('/srv/intro.md');
		expect(config.debugLogPath).toBe('/var/log/hook.log');
	});

	it('expands ~ and resolves relative paths against home', () => {
		const config = readSkillsConfig(
			{SKILLS_ROOT: '~/my-skills', SKILLS_HOOK_LOG: 'logs/hook.log'},
			HOME,
			TMP,
		);

		expect(config.skillsRoot).toBe('/home/tester/my-skills');
		expect(config.debugLogPath).toBe('/home/tester/logs/hook.log');
		expect(readSkillsConfig({SKILLS_CONFIG_ROOT: '~'}, HOME, TMP).configRoot).toBe(
			HOME,
		);
	});

	it('treats blank variables as unset', () => {
		const config = readSkillsConfig({SKILLS_ROOT: '   '}, HOME, TMP);

		expect(config.skillsRoot).toBe('/home/tester/.claude/skills');
	});

	it.each([
		['1', true],
		['true', true],
		['yes', true],
		['0', false],
		['false', false],
		['OFF', false],
		['no', false],
		['', false],
	])('reads SKILLS_DEBUG=%j as %s', (value, expected) => {
		expect(readSkillsConfig({SKILLS_DEBUG: value}, HOME, TMP).debug).toBe(
			expected,
		);
	});
});
