/**
 * SessionStart hook - injects the skills catalog into a new session.
 *
 * Flow:
 * 1. Build the registry and render the full catalog (in process)
 * 2. Read the introductory skill document
 * 3. Compose both into `additionalContext` and write one JSON object
 * 4. Append a line to the hook debug log
 *
 * A missing root or unreadable introduction is replaced by fallback text.
 * The exit code is always 0.
 */

import fs from 'node:fs';
import {querySkills} from '../../../core/skills/query';
import {formatSkillListing} from '../../../core/skills/format';
import type {SkillsConfig} from '../../../infra/config/skillsConfig';
import {buildRegistry} from '../../../infra/skills/registry';
import {errorMessage} from '../../../shared/utils/errorMessage';
import {
	createSessionStartOutput,
	type SessionStartHookOutput,
} from '../protocol/sessionStart';
import {appendHookLog, type SessionStartLogEntry} from './hookLog';

export const CATALOG_FALLBACK_PREFIX = 'Error running find-skills';
export const INTRO_FALLBACK_PREFIX = 'Error reading using-skills';

type Writer = {
	write: (chunk: string) => unknown;
};

export type SessionStartDeps = {
	now?: () => Date;
	buildRegistryFn?: typeof buildRegistry;
	readFile?: (filePath: string) => string;
	appendLog?: typeof appendHookLog;
	stdout?: Writer;
};

type CatalogSection =
	| {ok: true; text: string; skills: number; parseErrors: number}
	| {ok: false; text: string; error: string};

type IntroSection =
	| {ok: true; text: string}
	| {ok: false; text: string; error: string};

export type SessionStartReport = {
	output: SessionStartHookOutput;
	catalog: CatalogSection;
	intro: IntroSection;
};

/**
 * Build the hook output without writing anything.
 */
export function buildSessionStartOutput(
	config: SkillsConfig,
	deps: SessionStartDeps = {},
): SessionStartReport {
	const now = deps.now ?? (() => new Date());
	const catalog = loadCatalog(config, deps.buildRegistryFn ?? buildRegistry);
	const intro = loadIntro(
		config,
		deps.readFile ?? (filePath => fs.readFileSync(filePath, 'utf-8')),
	);

	const additionalContext = composeAdditionalContext({
		timestamp: formatTimestamp(now()),
		introPath: config.introDocumentPath,
		introText: intro.text,
		skillsRoot: config.skillsRoot,
		catalogText: catalog.text,
	});

	return {output: createSessionStartOutput(additionalContext), catalog, intro};
}

/**
 * Run the hook end to end: emit exactly one JSON object on stdout, log,
 * and return the exit code (always 0).
 */
export function runSessionStartHook(
	config: SkillsConfig,
	deps: SessionStartDeps = {},
): number {
	const stdout: Writer = deps.stdout ?? process.stdout;
	const now = deps.now ?? (() => new Date());
	const appendLog = deps.appendLog ?? appendHookLog;

	let report: SessionStartReport;
	try {
		report = buildSessionStartOutput(config, {...deps, now});
	} catch (error) {
		// Steps contain their own failures; `now` itself may be what threw
		const detail = errorMessage(error);
		const failedAt = new Date();
		const additionalContext = composeAdditionalContext({
			timestamp: formatTimestamp(failedAt),
			introPath: config.introDocumentPath,
			introText: `${INTRO_FALLBACK_PREFIX}: ${detail}`,
			skillsRoot: config.skillsRoot,
			catalogText: `${CATALOG_FALLBACK_PREFIX}: ${detail}`,
		});
		stdout.write(
			JSON.stringify(createSessionStartOutput(additionalContext)) + '\n',
		);
		appendLog(config.debugLogPath, {
			ts: failedAt.toISOString(),
			type: 'session_start',
			skills_root: config.skillsRoot,
			skills: null,
			parse_errors: 0,
			catalog_error: detail,
			intro_error: detail,
		});
		return 0;
	}

	stdout.write(JSON.stringify(report.output) + '\n');

	const entry: SessionStartLogEntry = {
		ts: now().toISOString(),
		type: 'session_start',
		skills_root: config.skillsRoot,
		skills: report.catalog.ok ? report.catalog.skills : null,
		parse_errors: report.catalog.ok ? report.catalog.parseErrors : 0,
	};
	if (!report.catalog.ok) entry.catalog_error = report.catalog.error;
	if (!report.intro.ok) entry.intro_error = report.intro.error;
	appendLog(config.debugLogPath, entry);

	return 0;
}

function loadCatalog(
	config: SkillsConfig,
	buildRegistryFn: typeof buildRegistry,
): CatalogSection {
	try {
		const result = buildRegistryFn(config.skillsRoot);
		if (!result.ok) {
			const error = `Skills root not found: ${result.error.root} (${result.error.reason})`;
			return {ok: false, text: `${CATALOG_FALLBACK_PREFIX}: ${error}`, error};
		}

		const {registry} = result;
		const listing = formatSkillListing(querySkills(registry), {color: false});
		const skipped = registry.errors.map(
			parseError => `- ${parseError.path}: ${parseError.reason}`,
		);
		const text =
			skipped.length > 0
				? `${listing}\n\nSkipped invalid skill documents:\n${skipped.join('\n')}`
				: listing;

		return {
			ok: true,
			text,
			skills: registry.documents.size,
			parseErrors: registry.errors.length,
		};
	} catch (error) {
		const detail = errorMessage(error);
		return {
			ok: false,
			text: `${CATALOG_FALLBACK_PREFIX}: ${detail}`,
			error: detail,
		};
	}
}

function loadIntro(
	config: SkillsConfig,
	readFile: (filePath: string) => string,
): IntroSection {
	try {
		return {ok: true, text: readFile(config.introDocumentPath)};
	} catch (error) {
		const detail = errorMessage(error);
		return {
			ok: false,
			text: `${INTRO_FALLBACK_PREFIX}: ${detail}`,
			error: detail,
		};
	}
}

export type ContextParts = {
	timestamp: string;
	introPath: string;
	introText: string;
	skillsRoot: string;
	catalogText: string;
};

export function composeAdditionalContext(parts: ContextParts): string {
	return [
		'<EXTREMELY_IMPORTANT>',
		`SessionStart hook executed successfully at ${parts.timestamp}`,
		'',
		'You have skills available.',
		'',
		`**The content below is from ${parts.introPath} - your introduction to using skills:**`,
		'',
		parts.introText,
		'',
		'**Commands (use these when you need to search for or run skills):**',
		'- find-skills [pattern]: list skills, optionally filtered by a case-insensitive regex',
		"- skill-run <skill-id> [args...]: run a skill's script, or print the skill when it has none",
		'',
		`**Skills live in:** ${parts.skillsRoot}/ (you can edit any skill)`,
		'',
		'**Available skills (output of find-skills):**',
		'',
		parts.catalogText,
		'</EXTREMELY_IMPORTANT>',
	].join('\n');
}

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
	const pad = (n: number) => String(n).padStart(2, '0');
	return (
		`${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
		`${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
	);
}
