/**
 * Skill runner.
 *
 * Resolves a skill identifier through the registry and executes the
 * artifact behind it, passing its exit status through unchanged:
 *
 * - the script named by the `run` header key (relative to the skill dir), or
 * - the first companion script found among RUN_SCRIPT_CANDIDATES, or
 * - failing both, the document itself, written to stdout for display.
 *
 * Execution is synchronous with inherited stdio, so the script talks to
 * the caller's terminal directly.
 */

import {
	spawnSync as nodeSpawnSync,
	type SpawnSyncOptions,
	type SpawnSyncReturns,
} from 'node:child_process';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {getSkill} from '../../infra/skills/registry';
import type {SkillDocument, SkillRegistry} from '../../infra/skills/types';
import {errorMessage} from '../../shared/utils/errorMessage';
import {
	SKILL_RUN_EXIT_CODE,
	type SkillExecutionError,
	type SkillNotFoundError,
} from './types';

const RUN_SCRIPT_CANDIDATES = ['run', 'run.sh', 'run.mjs', 'run.js'];

export type SpawnSyncFn = (
	command: string,
	args: string[],
	options: SpawnSyncOptions,
) => Pick<SpawnSyncReturns<Buffer>, 'status' | 'signal' | 'error'>;

export type RunSkillDeps = {
	spawnSync?: SpawnSyncFn;
	writeStdout?: (chunk: string) => void;
	env?: NodeJS.ProcessEnv;
	/** Interpreter for .js/.mjs scripts. */
	nodeExecutable?: string;
};

export type SkillArtifact =
	| {kind: 'script'; path: string; command: string; args: string[]}
	| {kind: 'document'; path: string};

export type RunSkillResult =
	| {ok: true; id: string; artifact: SkillArtifact}
	| {
			ok: false;
			error: SkillNotFoundError | SkillExecutionError;
			artifact?: SkillArtifact;
	  };

type ArtifactResolution =
	| {ok: true; artifact: SkillArtifact}
	| {ok: false; status: number; message: string};

/**
 * Decide what running `skill` means. Does not execute anything.
 */
export function resolveArtifact(
	skill: SkillDocument,
	args: string[] = [],
	nodeExecutable: string = process.execPath,
): ArtifactResolution {
	let scriptPath: string | undefined;

	if (skill.metadata.run) {
		const declared = path.resolve(skill.dir, skill.metadata.run);
		const relative = path.relative(skill.dir, declared);
		if (relative.startsWith('..') || path.isAbsolute(relative)) {
			return {
				ok: false,
				status: SKILL_RUN_EXIT_CODE.NOT_EXECUTABLE,
				message: `Run script "${skill.metadata.run}" is outside the skill directory`,
			};
		}
		if (!isFile(declared)) {
			return {
				ok: false,
				status: SKILL_RUN_EXIT_CODE.COMMAND_NOT_FOUND,
				message: `Run script not found: ${declared}`,
			};
		}
		scriptPath = declared;
	} else {
		scriptPath = RUN_SCRIPT_CANDIDATES.map(name =>
			path.join(skill.dir, name),
		).find(candidate => isFile(candidate));
	}

	if (!scriptPath) {
		return {ok: true, artifact: {kind: 'document', path: skill.path}};
	}

	const extension = path.extname(scriptPath);
	if (extension === '.sh') {
		return {
			ok: true,
			artifact: {
				kind: 'script',
				path: scriptPath,
				command: 'sh',
				args: [scriptPath, ...args],
			},
		};
	}
	if (extension === '.js' || extension === '.mjs') {
		return {
			ok: true,
			artifact: {
				kind: 'script',
				path: scriptPath,
				command: nodeExecutable,
				args: [scriptPath, ...args],
			},
		};
	}
	return {
		ok: true,
		artifact: {kind: 'script', path: scriptPath, command: scriptPath, args},
	};
}

export function runSkill(
	registry: SkillRegistry,
	id: string,
	args: string[] = [],
	deps: RunSkillDeps = {},
): RunSkillResult {
	const skill = getSkill(registry, id);
	if (!skill) {
		return {ok: false, error: {kind: 'not_found', id}};
	}

	const resolution = resolveArtifact(skill, args, deps.nodeExecutable);
	if (!resolution.ok) {
		return {
			ok: false,
			error: {
				kind: 'execution_error',
				id: skill.id,
				status: resolution.status,
				message: resolution.message,
			},
		};
	}

	const {artifact} = resolution;

	if (artifact.kind === 'document') {
		const writeStdout =
			deps.writeStdout ?? ((chunk: string) => process.stdout.write(chunk));
		try {
			writeStdout(fs.readFileSync(artifact.path, 'utf-8'));
		} catch (error) {
			return {
				ok: false,
				artifact,
				error: {
					kind: 'execution_error',
					id: skill.id,
					status: 1,
					message: `Could not read ${artifact.path}: ${errorMessage(error)}`,
				},
			};
		}
		return {ok: true, id: skill.id, artifact};
	}

	const spawnSync: SpawnSyncFn = deps.spawnSync ?? nodeSpawnSync;
	const result = spawnSync(artifact.command, artifact.args, {
		stdio: 'inherit',
		env: {
			...(deps.env ?? process.env),
			SKILLS_ROOT: registry.root,
			SKILL_ID: skill.id,
			SKILL_DIR: skill.dir,
		},
	});

	const failure = describeFailure(result);
	if (failure) {
		return {
			ok: false,
			artifact,
			error: {kind: 'execution_error', id: skill.id, ...failure},
		};
	}

	return {ok: true, id: skill.id, artifact};
}

/**
 * Map a spawn result to the status the caller should exit with.
 * Returns undefined for a clean exit.
 */
export function describeFailure(
	result: Pick<SpawnSyncReturns<Buffer>, 'status' | 'signal' | 'error'>,
): {status: number; message: string} | undefined {
	if (result.error) {
		const code = 'code' in result.error ? result.error.code : undefined;
		return {
			status:
				code === 'ENOENT'
					? SKILL_RUN_EXIT_CODE.COMMAND_NOT_FOUND
					: SKILL_RUN_EXIT_CODE.NOT_EXECUTABLE,
			message: `Failed to start: ${result.error.message}`,
		};
	}

	if (result.signal) {
		const signal = result.signal;
		const signalNumber = Object.entries(os.constants.signals).find(
			([name]) => name === signal,
		)?.[1];
		return {
			status: signalNumber === undefined ? 1 : 128 + signalNumber,
			message: `Terminated by ${result.signal}`,
		};
	}

	if (result.status === 0) return undefined;

	const status = result.status ?? 1;
	return {status, message: `Exited with status ${status}`};
}

function isFile(filePath: string): boolean {
	try {
		return fs.statSync(filePath).isFile();
	} catch {
		return false;
	}
}
