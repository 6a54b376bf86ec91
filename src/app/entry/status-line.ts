#!/usr/bin/env node
/**
 * Status line entry - Claude Code pipes session JSON to stdin.
 *
 * Register in settings.json:
 *   "statusLine": {"type": "command", "command": "skills-status-line"}
 */

import {runStatusLineCommand} from './statusLineCommand';

async function readStdin(): Promise<string> {
	return new Promise((resolve, reject) => {
		let data = '';
		process.stdin.setEncoding('utf8');
		process.stdin.on('data', (chunk: string) => {
			data += chunk;
		});
		process.stdin.on('end', () => {
			resolve(data);
		});
		process.stdin.on('error', reject);
	});
}

async function main(): Promise<void> {
	let stdinText: string;
	try {
		stdinText = await readStdin();
	} catch {
		// Rendered as a parse error in the fallback line
		stdinText = '';
	}
	process.exitCode = runStatusLineCommand({stdinText, cwd: process.cwd()});
}

void main();
