/**
 * Skill document types.
 */

/** Frontmatter keys matching the kebab/snake-case convention in SKILL.md files. */
export type SkillMetadata = {
	name: string;
	description: string;
	/** Trigger condition: when the skill is relevant. */
	when_to_use: string;
	version?: string;
	/** Lower-cased, de-duplicated. `all` means universally applicable. */
	languages?: string[];
	'allowed-tools'?: string[];
	/** Companion script to execute, relative to the skill directory. */
	run?: string;
	/** Header keys without a dedicated field, kept as parsed. */
	extra: Record<string, FrontmatterValue>;
};

export type FrontmatterValue = string | boolean | string[];

export type ParsedSkillDocument = {
	metadata: SkillMetadata;
	body: string;
};

export type ParseError = {
	path: string;
	reason: string;
};

export type ParseResult =
	| {ok: true; document: ParsedSkillDocument}
	| {ok: false; error: ParseError};

export type SkillDocument = ParsedSkillDocument & {
	/** Directory of the document relative to the registry root, `/`-separated. */
	id: string;
	/** First segment of `id`. */
	category: string;
	/** Absolute path to the SKILL.md file. */
	path: string;
	/** Absolute path to the directory holding SKILL.md. */
	dir: string;
};

/** The registry root is missing, not a directory, or unreadable. */
export type RootNotFoundError = {
	kind: 'root_not_found';
	root: string;
	reason: string;
};

/**
 * Point-in-time index of a skills root. Built fresh per invocation and
 * never mutated after construction.
 */
export type SkillRegistry = {
	readonly root: string;
	readonly documents: ReadonlyMap<string, SkillDocument>;
	readonly errors: readonly ParseError[];
};

export type RegistryResult =
	| {ok: true; registry: SkillRegistry}
	| {ok: false; error: RootNotFoundError};
