#!/usr/bin/env node
import meow from 'meow';
import {readSkillsConfig} from '../../infra/config/skillsConfig';
import {runSkillRunCommand, splitRunArgv} from './skillRunCommand';

const {ownArgs, skillArgs} = splitRunArgv(process.argv.slice(2));

const cli = meow(
	`
		Usage
		  $ skill-run [options] <skill-id> [args...]

		Runs the script behind a skill: the file named by its "run" header,
		else run, run.sh, run.mjs or run.js in the skill directory. A skill
		without a script is printed instead. Arguments after the identifier
		are passed to the script; its exit code is returned unchanged.

		Options
			--verbose   Show what was run on stderr
			--help      Show command help
			--version   Show version

		Exit codes
			2  Missing skill identifier
			3  Skills root missing or unreadable
			4  Unknown skill identifier
			*  Otherwise, the script's own exit code

		Examples
		  $ skill-run analysis/code-archaeology
		  $ skill-run --verbose tools/lint --fix src
	`,
	{
		importMeta: import.meta,
		argv: ownArgs,
		allowUnknownFlags: false,
		flags: {
			verbose: {
				type: 'boolean',
				default: false,
			},
		},
	},
);

process.exitCode = runSkillRunCommand({
	args: skillArgs,
	verbose: cli.flags.verbose,
	config: readSkillsConfig(),
});
