import {Chalk, type ChalkInstance} from 'chalk';
import {
	getGitBranch,
	parseStatusLineInput,
	renderStatusLine,
	renderStatusLineError,
} from '../../harnesses/claude/statusLine/statusLine';
import {errorMessage} from '../../shared/utils/errorMessage';

type Writer = {
	write: (chunk: string) => unknown;
};

export type RunStatusLineCommandInput = {
	stdinText: string;
	cwd: string;
};

export type RunStatusLineCommandDeps = {
	stdout?: Writer;
	/** Claude Code renders ANSI even though stdout is a pipe. */
	colors?: ChalkInstance;
	getBranch?: (cwd: string) => string | undefined;
};

/**
 * Print one status line. Always exits 0; errors become part of the line.
 */
export function runStatusLineCommand(
	input: RunStatusLineCommandInput,
	deps: RunStatusLineCommandDeps = {},
): number {
	const stdout: Writer = deps.stdout ?? process.stdout;
	const colors = deps.colors ?? new Chalk({level: 1});
	const getBranch = deps.getBranch ?? getGitBranch;

	let line: string;
	try {
		const parsed = parseStatusLineInput(input.stdinText);
		line = renderStatusLine(parsed, {branch: getBranch(input.cwd), colors});
	} catch (error) {
		line = renderStatusLineError(errorMessage(error), input.cwd, colors);
	}

	stdout.write(`${line}\n`);
	return 0;
}
