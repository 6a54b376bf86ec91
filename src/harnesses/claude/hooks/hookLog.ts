/**
 * Hook debug logger.
 *
 * Appends one NDJSON line per hook invocation for debugging with
 * `tail -f`. Write-only: nothing reads the file back, and a failed write
 * never fails the hook.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

export type SessionStartLogEntry = {
	ts: string;
	type: 'session_start';
	skills_root: string;
	/** Null when the catalog could not be built. */
	skills: number | null;
	parse_errors: number;
	catalog_error?: string;
	intro_error?: string;
};

export type HookLogEntry = SessionStartLogEntry;

/**
 * Append an entry to the log file, creating its directory if needed.
 *
 * @returns whether the line was written
 */
export function appendHookLog(logPath: string, entry: HookLogEntry): boolean {
	try {
		fs.mkdirSync(path.dirname(logPath), {recursive: true});
		fs.appendFileSync(logPath, JSON.stringify(entry) + '\n');
		return true;
	} catch {
		return false;
	}
}
