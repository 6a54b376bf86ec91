import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {describe, it, expect, beforeEach, afterEach} from 'vitest';
import {appendHookLog, type SessionStartLogEntry} from './hookLog';

const entry: SessionStartLogEntry = {
	ts: '2026-01-02T03:04:05.000Z',
	type: 'session_start',
	skills_root: '/skills',
	skills: 2,
	parse_errors: 1,
};

describe('appendHookLog', () => {
	let dir: string;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), 'hook-log-test-'));
	});

	afterEach(() => {
		fs.rmSync(dir, {recursive: true, force: true});
	});

	it('appends one JSON line per call, creating directories', () => {
		const logPath = path.join(dir, 'nested', 'hook.log');

		expect(appendHookLog(logPath, entry)).toBe(true);
		expect(
			appendHookLog(logPath, {...entry, skills: null, catalog_error: 'gone'}),
		).toBe(true);

		const lines = fs.readFileSync(logPath, 'utf-8').split('\n');
		expect(lines).toHaveLength(3);
		expect(lines[2]).toBe('');
		expect(JSON.parse(lines[0] ?? '')).toEqual(entry);
		expect(JSON.parse(lines[1] ?? '')).toEqual({
			...entry,
			skills: null,
			catalog_error: 'gone',
		});
	});

	it('returns false instead of throwing when the path is unwritable', () => {
		const blocker = path.join(dir, 'file');
		fs.writeFileSync(blocker, '');

		expect(appendHookLog(path.join(blocker, 'hook.log'), entry)).toBe(false);
	});
});
