/**
 * Skill registry.
 *
 * Walks a skills root, parses every SKILL.md it finds, and partitions the
 * results into valid documents and per-document parse errors. A document
 * that fails to read or parse is recorded in `errors`; the scan continues.
 *
 * Identifier: the document's directory relative to the root
 * (e.g. `analysis/code-archaeology`). Category: its first segment.
 */

import fs from 'node:fs';
import path from 'node:path';
import {errorMessage} from '../../shared/utils/errorMessage';
import {parseSkillDocument, SKILL_DOCUMENT_FILENAME} from './frontmatter';
import {
	type ParseError,
	type RegistryResult,
	type SkillDocument,
	type SkillRegistry,
} from './types';

const SKIPPED_DIRECTORIES = new Set(['node_modules']);

/**
 * Build a registry from the filesystem under `root`.
 *
 * Fails only when the root itself is missing, not a directory, or
 * unreadable. An empty but readable root yields an empty registry.
 */
export function buildRegistry(root: string): RegistryResult {
	const absRoot = path.resolve(root);

	let rootEntries: fs.Dirent[];
	let rootRealPath: string;
	try {
		if (!fs.statSync(absRoot).isDirectory()) {
			return {
				ok: false,
				error: {kind: 'root_not_found', root: absRoot, reason: 'not a directory'},
			};
		}
		rootEntries = fs.readdirSync(absRoot, {withFileTypes: true});
		rootRealPath = fs.realpathSync(absRoot);
	} catch (error) {
		return {
			ok: false,
			error: {kind: 'root_not_found', root: absRoot, reason: errorMessage(error)},
		};
	}

	const documents = new Map<string, SkillDocument>();
	const errors: ParseError[] = [];
	const visited = new Set<string>([rootRealPath]);

	const walk = (dir: string, relDir: string, entries: fs.Dirent[]): void => {
		const sorted = [...entries].sort((a, b) => compareNames(a.name, b.name));

		for (const entry of sorted) {
			const fullPath = path.join(dir, entry.name);

			if (entry.name === SKILL_DOCUMENT_FILENAME) {
				// A SKILL.md directly in the root has no identifier
				if (relDir !== '' && isFileEntry(entry, fullPath)) {
					loadDocument(fullPath, relDir);
				}
				continue;
			}

			if (entry.name.startsWith('.') || SKIPPED_DIRECTORIES.has(entry.name)) {
				continue;
			}

			if (!isDirectoryEntry(entry, fullPath)) continue;

			let realPath: string;
			let childEntries: fs.Dirent[];
			try {
				realPath = fs.realpathSync(fullPath);
				if (visited.has(realPath)) continue;
				childEntries = fs.readdirSync(fullPath, {withFileTypes: true});
			} catch (error) {
				errors.push({
					path: fullPath,
					reason: `Unreadable directory: ${errorMessage(error)}`,
				});
				continue;
			}

			visited.add(realPath);
			const childRel = relDir === '' ? entry.name : `${relDir}/${entry.name}`;
			walk(fullPath, childRel, childEntries);
		}
	};

	const loadDocument = (filePath: string, id: string): void => {
		let content: string;
		try {
			content = fs.readFileSync(filePath, 'utf-8');
		} catch (error) {
			errors.push({
				path: filePath,
				reason: `Unreadable file: ${errorMessage(error)}`,
			});
			return;
		}

		const parsed = parseSkillDocument(content, filePath);
		if (!parsed.ok) {
			errors.push(parsed.error);
			return;
		}

		documents.set(id, {
			...parsed.document,
			id,
			category: categoryOf(id),
			path: filePath,
			dir: path.dirname(filePath),
		});
	};

	walk(absRoot, '', rootEntries);

	return {
		ok: true,
		registry: Object.freeze({
			root: absRoot,
			documents,
			errors: Object.freeze(errors),
		}),
	};
}

/**
 * Normalise a user-supplied identifier: `/` separators, no leading `./`,
 * no trailing `/` or `/SKILL.md`, absolute paths under the root made
 * relative.
 */
export function normalizeSkillId(registry: SkillRegistry, id: string): string {
	let normalized = id.trim();

	if (path.isAbsolute(normalized)) {
		const relative = path.relative(registry.root, normalized);
		if (!relative.startsWith('..') && !path.isAbsolute(relative)) {
			normalized = relative;
		}
	}

	normalized = normalized.replaceAll('\\', '/');

	while (normalized.startsWith('./')) {
		normalized = normalized.slice(2);
	}

	if (normalized.endsWith(`/${SKILL_DOCUMENT_FILENAME}`)) {
		normalized = normalized.slice(0, -(SKILL_DOCUMENT_FILENAME.length + 1));
	} else if (normalized === SKILL_DOCUMENT_FILENAME) {
		normalized = '';
	}

	return normalized.replace(/\/+$/, '');
}

/**
 * Look up a document by identifier. Returns undefined if absent.
 */
export function getSkill(
	registry: SkillRegistry,
	id: string,
): SkillDocument | undefined {
	return registry.documents.get(normalizeSkillId(registry, id));
}

export function hasSkill(registry: SkillRegistry, id: string): boolean {
	return registry.documents.has(normalizeSkillId(registry, id));
}

/**
 * All valid documents, ordered by identifier.
 */
export function listSkills(registry: SkillRegistry): SkillDocument[] {
	return [...registry.documents.values()].sort((a, b) =>
		compareNames(a.id, b.id),
	);
}

export function categoryOf(id: string): string {
	return id.split('/')[0] ?? id;
}

/**
 * Code-unit order, independent of the process locale.
 */
export function compareNames(a: string, b: string): number {
	if (a < b) return -1;
	if (a > b) return 1;
	return 0;
}

function isFileEntry(entry: fs.Dirent, fullPath: string): boolean {
	if (entry.isFile()) return true;
	if (!entry.isSymbolicLink()) return false;
	try {
		return fs.statSync(fullPath).isFile();
	} catch {
		return false;
	}
}

function isDirectoryEntry(entry: fs.Dirent, fullPath: string): boolean {
	if (entry.isDirectory()) return true;
	if (!entry.isSymbolicLink()) return false;
	try {
		return fs.statSync(fullPath).isDirectory();
	} catch {
		// Dangling symlink
		return false;
	}
}
