/**
 * pulumi-profile — Record Store
 *
 * Ordered list of named backends kept in a JSON file (by default
 * ~/.pulumi/profiles.json). Every mutation rewrites the whole file
 * atomically before it returns.
 *
 * Changes made to the file by another process between load and persist
 * are not detected; the last writer wins.
 */

import {
	createDuplicateNameError,
	createInvalidProfileError,
	createMalformedStoreError,
	createNotFoundError,
} from '../errors/index.js';
import { createNoopLogger, type Logger } from '../logger.js';
import { readTextFile, writeJsonFileAtomic } from './file-io.js';
import {
	parseStoreContent,
	validateBackend,
	validateProfileName,
} from './schema.js';
import type { ProfileRecord, RecordStore } from './types.js';

export interface RecordStoreOptions {
	/** Absolute path of the backing JSON file. */
	readonly path: string;
	readonly logger?: Logger;
}

export function createRecordStore(options: RecordStoreOptions): RecordStore {
	const storePath = options.path;
	const logger = (options.logger ?? createNoopLogger()).child('store');
	let records: readonly ProfileRecord[] | undefined;

	const load = (): readonly ProfileRecord[] => {
		const raw = readTextFile(storePath);
		if (raw === undefined || raw.trim().length === 0) {
			logger.debug('No profile store yet', { storePath });
			records = Object.freeze([]);
			return records;
		}

		let parsed: unknown;
		try {
			parsed = JSON.parse(raw);
		} catch (error) {
			throw createMalformedStoreError(
				storePath,
				[
					{
						path: '$',
						message: error instanceof Error ? error.message : 'invalid JSON',
					},
				],
				{ cause: error },
			);
		}

		const result = parseStoreContent(parsed);
		if (result.issues.length > 0) {
			throw createMalformedStoreError(storePath, result.issues);
		}

		logger.debug('Loaded profile store', {
			storePath,
			count: result.records.length,
		});
		records = result.records;
		return records;
	};

	const current = (): readonly ProfileRecord[] => records ?? load();

	const persist = (next: readonly ProfileRecord[]): void => {
		writeJsonFileAtomic(
			storePath,
			next.map(({ name, backend }) => ({ name, backend })),
		);
		records = Object.freeze([...next]);
		logger.debug('Persisted profile store', { storePath, count: next.length });
	};

	const indexOf = (name: string): number =>
		current().findIndex((record) => record.name === name);

	const requireIndex = (name: string): number => {
		const index = indexOf(name);
		if (index < 0) throw createNotFoundError(name, { storePath });
		return index;
	};

	const add = (name: string, backend: string): ProfileRecord => {
		const issues = [...validateProfileName(name), ...validateBackend(backend)];
		if (issues.length > 0) throw createInvalidProfileError(issues);
		if (indexOf(name) >= 0) throw createDuplicateNameError(name, { storePath });

		const record: ProfileRecord = Object.freeze({ name, backend });
		persist([...current(), record]);
		return record;
	};

	const edit = (name: string, backend: string): ProfileRecord => {
		const issues = validateBackend(backend);
		if (issues.length > 0) throw createInvalidProfileError(issues);
		const index = requireIndex(name);

		const record: ProfileRecord = Object.freeze({ name, backend });
		persist(current().map((existing, i) => (i === index ? record : existing)));
		return record;
	};

	const deleteRecord = (name: string): ProfileRecord => {
		const index = requireIndex(name);
		const all = current();
		const removed = all[index];
		if (!removed) throw createNotFoundError(name, { storePath });

		persist(all.filter((_, i) => i !== index));
		return removed;
	};

	return Object.freeze({
		load,
		list: current,
		get: (name: string) => current().find((record) => record.name === name),
		add,
		edit,
		delete: deleteRecord,
		getPath: () => storePath,
	});
}
