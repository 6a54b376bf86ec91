import fs from 'node:fs';
import path from 'node:path';
import {describe, it, expect, beforeEach, afterEach} from 'vitest';
import {
	makeSkillsRoot,
	validSkill,
	writeSkill,
} from '../../infra/skills/__tests__/fixtures';
import {runFindSkillsCommand, type FindSkillsCliFlags} from './findSkillsCommand';
import {captureOutput, configFor} from './__tests__/commandFixtures';

const FLAGS: FindSkillsCliFlags = {json: false, verbose: false, color: false};

describe('runFindSkillsCommand', () => {
	let root: string;

	beforeEach(() => {
		root = makeSkillsRoot();
		writeSkill(
			root,
			'analysis/code-archaeology',
			validSkill('code-archaeology', {
				description: 'Map an unfamiliar system',
				when_to_use: 'Working in a legacy codebase',
				languages: 'python',
			}),
		);
		writeSkill(root, 'testing/tdd', validSkill('tdd'));
	});

	afterEach(() => {
		fs.rmSync(root, {recursive: true, force: true});
	});

	it('prints the full listing without a pattern', () => {
		const {output, stdout, stderr} = captureOutput();

		const code = runFindSkillsCommand(
			{patterns: [], flags: FLAGS, config: configFor(root)},
			{output},
		);

		expect(code).toBe(0);
		expect(stdout).toEqual([
			[
				'## analysis',
				'',
				'- code-archaeology [analysis/code-archaeology]: Map an unfamiliar system',
				'  When to use: Working in a legacy codebase',
				'  Languages: python',
				'',
				'## testing',
				'',
				'- tdd [testing/tdd]: Description of tdd',
				'  When to use: When tdd applies',
				'',
			].join('\n'),
		]);
		expect(stderr).toEqual([]);
	});

	it('filters by pattern', () => {
		const {output, stdout} = captureOutput();

		const code = runFindSkillsCommand(
			{patterns: ['LEGACY'], flags: FLAGS, config: configFor(root)},
			{output},
		);

		expect(code).toBe(0);
		expect(stdout.join('')).toContain('[analysis/code-archaeology]');
		expect(stdout.join('')).not.toContain('[testing/tdd]');
	});

	it('reports no matches and still succeeds', () => {
		const {output, stdout} = captureOutput();

		const code = runFindSkillsCommand(
			{patterns: ['kubernetes'], flags: FLAGS, config: configFor(root)},
			{output},
		);

		expect(code).toBe(0);
		expect(stdout).toEqual(['No skills found matching "kubernetes".\n']);
	});

	it('filters by language', () => {
		const {output, stdout} = captureOutput();

		runFindSkillsCommand(
			{
				patterns: [],
				flags: {...FLAGS, language: 'rust'},
				config: configFor(root),
			},
			{output},
		);

		expect(stdout.join('')).toBe(
			'## testing\n\n- tdd [testing/tdd]: Description of tdd\n  When to use: When tdd applies\n',
		);
	});

	it('prints JSON on request', () => {
		const {output, stdout} = captureOutput();

		runFindSkillsCommand(
			{patterns: ['tdd'], flags: {...FLAGS, json: true}, config: configFor(root)},
			{output},
		);

		expect(JSON.parse(stdout.join(''))).toEqual({
			pattern: 'tdd',
			total: 1,
			categories: [
				{
					category: 'testing',
					skills: [
						{
							id: 'testing/tdd',
							name: 'tdd',
							description: 'Description of tdd',
							when_to_use: 'When tdd applies',
							version: null,
							languages: null,
							path: path.join(root, 'testing', 'tdd', 'SKILL.md'),
						},
					],
				},
			],
		});
	});

	it('rejects more than one pattern', () => {
		const {output, stdout, stderr} = captureOutput();

		const code = runFindSkillsCommand(
			{patterns: ['legacy', 'code'], flags: FLAGS, config: configFor(root)},
			{output},
		);

		expect(code).toBe(2);
		expect(stdout).toEqual([]);
		expect(stderr).toEqual([
			'[test] error: Expected at most one pattern, got 2. Quote patterns that contain spaces.\n',
		]);
	});

	it('fails when the skills root is missing', () => {
		const {output, stdout, stderr} = captureOutput();
		const missing = path.join(root, 'missing');

		const code = runFindSkillsCommand(
			{patterns: [], flags: FLAGS, config: configFor(missing)},
			{output},
		);

		expect(code).toBe(3);
		expect(stdout).toEqual([]);
		expect(stderr).toHaveLength(1);
		expect(stderr[0]).toMatch(/^\[test\] error: Skills root not found: .+ \(ENOENT/);
	});

	it('warns about invalid documents and lists the rest', () => {
		const badPath = writeSkill(root, 'broken/bad', 'no header');
		const {output, stdout, stderr} = captureOutput();

		const code = runFindSkillsCommand(
			{patterns: ['tdd'], flags: FLAGS, config: configFor(root)},
			{output},
		);

		expect(code).toBe(0);
		expect(stderr).toEqual([
			`[test] warning: skipped ${badPath}: SKILL.md must start with --- frontmatter delimiter\n`,
		]);
		expect(stdout.join('')).toContain('[testing/tdd]');
	});

	it('logs the scan and a literal fallback when verbose', () => {
		const {output, stdout, stderr} = captureOutput(true);

		runFindSkillsCommand(
			{patterns: ['tdd('], flags: {...FLAGS, verbose: true}, config: configFor(root)},
			{output},
		);

		expect(stderr).toEqual([
			`[test] Scanned ${root}: 2 valid, 0 invalid\n`,
			'[test] "tdd(" is not a valid regular expression; matching it literally\n',
		]);
		expect(stdout).toEqual(['No skills found matching "tdd(".\n']);
	});
});
