import type {RootNotFoundError, SkillDocument} from '../../infra/skills/types';

export type SkillNotFoundError = {
	kind: 'not_found';
	id: string;
};

/** The artifact ran (or failed to start) and did not exit cleanly. */
export type SkillExecutionError = {
	kind: 'execution_error';
	id: string;
	status: number;
	message: string;
};

export type SkillsError =
	| RootNotFoundError
	| SkillNotFoundError
	| SkillExecutionError;

export type SkillQuery = {
	/** Case-insensitive regex; invalid syntax falls back to a literal match. */
	pattern?: string;
	/** Keep documents applicable to this language (unset or `all` always match). */
	language?: string;
};

export type SkillCategoryGroup = {
	category: string;
	skills: SkillDocument[];
};

export type SkillQueryResult = {
	pattern?: string;
	/** Whether the pattern was used as a regex or fell back to a literal. */
	matchMode: 'all' | 'regex' | 'literal';
	groups: SkillCategoryGroup[];
	total: number;
};

export const FIND_SKILLS_EXIT_CODE = {
	SUCCESS: 0,
	USAGE: 2,
	ROOT_NOT_FOUND: 3,
} as const;

export const SKILL_RUN_EXIT_CODE = {
	SUCCESS: 0,
	USAGE: 2,
	ROOT_NOT_FOUND: 3,
	NOT_FOUND: 4,
	NOT_EXECUTABLE: 126,
	COMMAND_NOT_FOUND: 127,
} as const;
