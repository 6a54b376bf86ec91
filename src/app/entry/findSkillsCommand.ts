import {formatSkillListing, toCatalogJson} from '../../core/skills/format';
import {querySkills} from '../../core/skills/query';
import {FIND_SKILLS_EXIT_CODE} from '../../core/skills/types';
import type {SkillsConfig} from '../../infra/config/skillsConfig';
import {buildRegistry} from '../../infra/skills/registry';
import {createCliOutput, type CliOutput} from '../output/cliOutput';

export type FindSkillsCliFlags = {
	json: boolean;
	language?: string;
	verbose: boolean;
	color: boolean;
};

export type RunFindSkillsCommandInput = {
	/** Positional arguments; at most one pattern. */
	patterns: string[];
	flags: FindSkillsCliFlags;
	config: SkillsConfig;
};

export type RunFindSkillsCommandDeps = {
	output?: CliOutput;
	buildRegistryFn?: typeof buildRegistry;
};

export function runFindSkillsCommand(
	input: RunFindSkillsCommandInput,
	deps: RunFindSkillsCommandDeps = {},
): number {
	const {flags, config} = input;
	const output =
		deps.output ??
		createCliOutput({
			command: 'find-skills',
			verbose: flags.verbose || config.debug,
			stdout: process.stdout,
			stderr: process.stderr,
		});
	const buildRegistryFn = deps.buildRegistryFn ?? buildRegistry;

	if (input.patterns.length > 1) {
		output.error(
			`Expected at most one pattern, got ${input.patterns.length}. Quote patterns that contain spaces.`,
		);
		return FIND_SKILLS_EXIT_CODE.USAGE;
	}

	const result = buildRegistryFn(config.skillsRoot);
	if (!result.ok) {
		output.error(
			`Skills root not found: ${result.error.root} (${result.error.reason})`,
		);
		return FIND_SKILLS_EXIT_CODE.ROOT_NOT_FOUND;
	}

	const {registry} = result;
	output.log(
		`Scanned ${registry.root}: ${registry.documents.size} valid, ${registry.errors.length} invalid`,
	);
	for (const parseError of registry.errors) {
		output.warn(`skipped ${parseError.path}: ${parseError.reason}`);
	}

	const query = querySkills(registry, {
		pattern: input.patterns[0],
		language: flags.language,
	});
	if (query.matchMode === 'literal') {
		output.log(
			`"${input.patterns[0] ?? ''}" is not a valid regular expression; matching it literally`,
		);
	}

	if (flags.json) {
		output.printJson(toCatalogJson(query));
	} else {
		output.print(formatSkillListing(query, {color: flags.color}));
	}

	return FIND_SKILLS_EXIT_CODE.SUCCESS;
}
