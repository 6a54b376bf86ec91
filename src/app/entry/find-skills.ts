#!/usr/bin/env node
import chalk from 'chalk';
import meow from 'meow';
import {readSkillsConfig} from '../../infra/config/skillsConfig';
import {runFindSkillsCommand} from './findSkillsCommand';

const cli = meow(
	`
		Usage
		  $ find-skills [pattern]

		Lists every skill under the skills root, grouped by category.
		With a pattern, only skills whose name, description, when_to_use
		or category match it (case-insensitive regex; invalid regex
		syntax is matched literally).

		Options
			--language, -l  Only skills that apply to this language
			--json          Print the catalog as JSON
			--verbose       Show scan details on stderr
			--help          Show command help
			--version       Show version

		Environment
			SKILLS_CONFIG_ROOT  Configuration root (default: ~/.claude)
			SKILLS_ROOT         Skills root (default: $SKILLS_CONFIG_ROOT/skills)

		Exit codes
			0  Success, including no matches
			2  Usage error
			3  Skills root missing or unreadable

		Examples
		  $ find-skills
		  $ find-skills legacy
		  $ find-skills 'test(ing)?' --language typescript
	`,
	{
		importMeta: import.meta,
		allowUnknownFlags: false,
		flags: {
			language: {
				type: 'string',
				shortFlag: 'l',
			},
			json: {
				type: 'boolean',
				default: false,
			},
			verbose: {
				type: 'boolean',
				default: false,
			},
		},
	},
);

process.exitCode = runFindSkillsCommand({
	patterns: cli.input,
	flags: {
		json: cli.flags.json,
		language: cli.flags.language,
		verbose: cli.flags.verbose,
		color: chalk.level > 0,
	},
	config: readSkillsConfig(),
});
