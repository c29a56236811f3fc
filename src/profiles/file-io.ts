/**
 * pulumi-profile — File I/O
 *
 * Synchronous reads and atomic writes for the store and pointer files.
 * Writes go to a temporary file beside the target and are renamed over it,
 * so a reader never observes a partially written file.
 */

import {
	existsSync,
	mkdirSync,
	readFileSync,
	renameSync,
	rmSync,
	writeFileSync,
} from 'node:fs';
import { dirname } from 'node:path';
import { createStoreIOError } from '../errors/index.js';

const isMissingFileError = (error: unknown): boolean =>
	error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * Read a UTF-8 text file. Returns undefined if the file doesn't exist.
 */
export function readTextFile(path: string): string | undefined {
	try {
		return readFileSync(path, 'utf-8');
	} catch (error) {
		if (isMissingFileError(error)) return undefined;
		throw createStoreIOError(path, 'read', { cause: error });
	}
}

/**
 * Replace a file's content atomically. Creates parent directories if needed.
 */
export function writeFileAtomic(path: string, content: string): void {
	const tmpPath = `${path}.${process.pid}.tmp`;
	try {
		mkdirSync(dirname(path), { recursive: true });
		writeFileSync(tmpPath, content, 'utf-8');
		renameSync(tmpPath, path);
	} catch (error) {
		if (existsSync(tmpPath)) rmSync(tmpPath, { force: true });
		throw createStoreIOError(path, 'write', { cause: error });
	}
}

/**
 * Serialise a value as pretty JSON and write it atomically.
 */
export function writeJsonFileAtomic(path: string, data: unknown): void {
	writeFileAtomic(path, `${JSON.stringify(data, null, '\t')}\n`);
}

/**
 * Remove a file. Returns false when there was nothing to remove.
 */
export function removeFile(path: string): boolean {
	try {
		rmSync(path);
		return true;
	} catch (error) {
		if (isMissingFileError(error)) return false;
		throw createStoreIOError(path, 'remove', { cause: error });
	}
}
