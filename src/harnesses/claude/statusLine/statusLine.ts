/**
 * Status line renderer for Claude Code's `statusLine` command hook.
 *
 * Claude Code pipes a JSON description of the session to stdin and shows
 * the first line we print:
 *
 *   [Opus] 📁 src/app ⎇ main | 💰 $0.123 ⏱ 12m 📝 +40
 */

import {spawnSync} from 'node:child_process';
import path from 'node:path';
import type {ChalkInstance} from 'chalk';

export type StatusLineInput = {
	modelName: string;
	currentDir?: string;
	projectDir?: string;
	costUsd: number;
	durationMs: number;
	linesAdded: number;
	linesRemoved: number;
};

const DEFAULT_MODEL_NAME = 'Claude';
const GIT_TIMEOUT_MS = 1000;
const ERROR_DETAIL_LENGTH = 20;

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readRecord(source: JsonRecord, key: string): JsonRecord {
	const value = source[key];
	return isRecord(value) ? value : {};
}

function readString(source: JsonRecord, key: string): string | undefined {
	const value = source[key];
	return typeof value === 'string' && value !== '' ? value : undefined;
}

function readNumber(source: JsonRecord, key: string): number {
	const value = source[key];
	return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

/**
 * Parse the status-line JSON. Throws on invalid JSON or a non-object.
 */
export function parseStatusLineInput(raw: string): StatusLineInput {
	const data: unknown = JSON.parse(raw);
	if (!isRecord(data)) {
		throw new Error('Expected a JSON object');
	}

	const model = readRecord(data, 'model');
	const workspace = readRecord(data, 'workspace');
	const cost = readRecord(data, 'cost');

	return {
		modelName: readString(model, 'display_name') ?? DEFAULT_MODEL_NAME,
		currentDir: readString(workspace, 'current_dir'),
		projectDir: readString(workspace, 'project_dir'),
		costUsd: readNumber(cost, 'total_cost_usd'),
		durationMs: readNumber(cost, 'total_duration_ms'),
		linesAdded: readNumber(cost, 'total_lines_added'),
		linesRemoved: readNumber(cost, 'total_lines_removed'),
	};
}

/**
 * Directory relative to the project root when inside it, else a basename.
 */
export function getDirectoryDisplay(
	currentDir: string | undefined,
	projectDir: string | undefined,
): string {
	if (currentDir && projectDir) {
		if (currentDir.startsWith(projectDir)) {
			const relative = currentDir.slice(projectDir.length).replace(/^\/+/, '');
			return relative || path.basename(projectDir);
		}
		return path.basename(currentDir);
	}
	if (projectDir) return path.basename(projectDir);
	if (currentDir) return path.basename(currentDir);
	return 'unknown';
}

export function formatCost(costUsd: number): string {
	return costUsd < 0.01
		? `${(costUsd * 100).toFixed(0)}¢`
		: `$${costUsd.toFixed(3)}`;
}

export function formatDuration(durationMs: number): string {
	const minutes = durationMs / 60_000;
	return minutes < 1
		? `${Math.floor(durationMs / 1000)}s`
		: `${minutes.toFixed(0)}m`;
}

/**
 * Cost, duration and net line changes. Empty when nothing is worth showing.
 */
export function getSessionMetrics(
	input: StatusLineInput,
	colors: ChalkInstance,
): string {
	const metrics: string[] = [];

	if (input.costUsd > 0) {
		const color =
			input.costUsd >= 0.1
				? colors.red
				: input.costUsd >= 0.05
					? colors.yellow
					: colors.green;
		metrics.push(color(`💰 ${formatCost(input.costUsd)}`));
	}

	if (input.durationMs > 0) {
		const color =
			input.durationMs / 60_000 >= 30 ? colors.yellow : colors.green;
		metrics.push(color(`⏱ ${formatDuration(input.durationMs)}`));
	}

	if (input.linesAdded > 0 || input.linesRemoved > 0) {
		const net = input.linesAdded - input.linesRemoved;
		const color =
			net > 0 ? colors.green : net < 0 ? colors.red : colors.yellow;
		const sign = net >= 0 ? '+' : '';
		metrics.push(color(`📝 ${sign}${net}`));
	}

	return metrics.length > 0
		? ` ${colors.gray('|')} ${metrics.join(' ')}`
		: '';
}

export function renderStatusLine(
	input: StatusLineInput,
	options: {branch?: string; colors: ChalkInstance},
): string {
	const {colors, branch} = options;
	const directory = getDirectoryDisplay(input.currentDir, input.projectDir);
	const branchDisplay = branch ? ` ${colors.magentaBright(`⎇ ${branch}`)}` : '';

	return (
		`${colors.blueBright(`[${input.modelName}]`)} ` +
		`${colors.yellowBright(`📁 ${directory}`)}` +
		branchDisplay +
		getSessionMetrics(input, colors)
	);
}

export function renderStatusLineError(
	error: string,
	cwd: string,
	colors: ChalkInstance,
): string {
	return (
		`${colors.blueBright(`[${DEFAULT_MODEL_NAME}]`)} ` +
		`${colors.yellowBright(`📁 ${path.basename(cwd)}`)} ` +
		colors.red(`[Error: ${error.slice(0, ERROR_DETAIL_LENGTH)}]`)
	);
}

/**
 * Current git branch of `cwd`, or undefined outside a repository.
 */
export function getGitBranch(cwd: string): string | undefined {
	const result = spawnSync('git', ['branch', '--show-current'], {
		cwd,
		encoding: 'utf-8',
		timeout: GIT_TIMEOUT_MS,
		stdio: ['ignore', 'pipe', 'ignore'],
	});
	if (result.error || result.status !== 0) return undefined;
	const branch = result.stdout.trim();
	return branch === '' ? undefined : branch;
}
