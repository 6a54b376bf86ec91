import {runSkill, type RunSkillDeps} from '../../core/skills/runner';
import {SKILL_RUN_EXIT_CODE, type SkillsError} from '../../core/skills/types';
import type {SkillsConfig} from '../../infra/config/skillsConfig';
import {buildRegistry} from '../../infra/skills/registry';
import {createCliOutput, type CliOutput} from '../output/cliOutput';

export type RunSkillRunCommandInput = {
	/** Skill identifier followed by arguments forwarded to the script. */
	args: string[];
	verbose: boolean;
	config: SkillsConfig;
};

export type RunSkillRunCommandDeps = {
	output?: CliOutput;
	buildRegistryFn?: typeof buildRegistry;
	runSkillFn?: typeof runSkill;
	runDeps?: RunSkillDeps;
};

/**
 * Split argv into skill-run's own flags and the part handed to the skill.
 * Everything from the first positional (or after `--`) belongs to the skill,
 * so flags meant for the script are never parsed here.
 */
export function splitRunArgv(argv: string[]): {
	ownArgs: string[];
	skillArgs: string[];
} {
	const separator = argv.indexOf('--');
	const firstPositional = argv.findIndex(arg => !arg.startsWith('-'));

	if (separator !== -1 && (firstPositional === -1 || separator < firstPositional)) {
		return {
			ownArgs: argv.slice(0, separator),
			skillArgs: argv.slice(separator + 1),
		};
	}
	if (firstPositional === -1) {
		return {ownArgs: argv, skillArgs: []};
	}
	return {
		ownArgs: argv.slice(0, firstPositional),
		skillArgs: argv.slice(firstPositional),
	};
}

export function runSkillRunCommand(
	input: RunSkillRunCommandInput,
	deps: RunSkillRunCommandDeps = {},
): number {
	const {config} = input;
	const output =
		deps.output ??
		createCliOutput({
			command: 'skill-run',
			verbose: input.verbose || config.debug,
			stdout: process.stdout,
			stderr: process.stderr,
		});
	const buildRegistryFn = deps.buildRegistryFn ?? buildRegistry;
	const runSkillFn = deps.runSkillFn ?? runSkill;

	const [id, ...skillArgs] = input.args;
	if (id === undefined || id.trim() === '') {
		output.error('Missing skill identifier. Usage: skill-run <skill-id> [args...]');
		return SKILL_RUN_EXIT_CODE.USAGE;
	}

	const built = buildRegistryFn(config.skillsRoot);
	if (!built.ok) {
		return reportError(output, built.error);
	}

	const result = runSkillFn(built.registry, id, skillArgs, deps.runDeps);
	if (result.ok) {
		output.log(
			result.artifact.kind === 'script'
				? `${result.id}: ran ${result.artifact.path}`
				: `${result.id}: no run script, printed ${result.artifact.path}`,
		);
		return SKILL_RUN_EXIT_CODE.SUCCESS;
	}

	return reportError(output, result.error);
}

/**
 * Print the diagnostic for a failed run and return the exit code.
 */
function reportError(output: CliOutput, error: SkillsError): number {
	switch (error.kind) {
		case 'root_not_found':
			output.error(`Skills root not found: ${error.root} (${error.reason})`);
			return SKILL_RUN_EXIT_CODE.ROOT_NOT_FOUND;
		case 'not_found':
			output.error(
				`Skill not found: "${error.id}". Run find-skills to list available skills.`,
			);
			return SKILL_RUN_EXIT_CODE.NOT_FOUND;
		case 'execution_error':
			output.error(`Skill "${error.id}" failed: ${error.message}`);
			return error.status;
		default: {
			const _exhaustive: never = error;
			return _exhaustive;
		}
	}
}
