// ---------------------------------------------------------------------------
// Profile store validation
// ---------------------------------------------------------------------------
//
// The store file is plain JSON: an array of `{ name, backend }` objects.
// Validators return lists of issues instead of throwing so that a single
// pass can report every problem in a hand-edited file.
// ---------------------------------------------------------------------------

import type { ValidationIssue } from '../errors/index.js';
import type { ProfileRecord } from './types.js';

const issue = (path: string, message: string): readonly ValidationIssue[] =>
	Object.freeze([Object.freeze({ path, message })]);

const ok: readonly ValidationIssue[] = Object.freeze([]);

const combine = (
	...results: ReadonlyArray<readonly ValidationIssue[]>
): readonly ValidationIssue[] => Object.freeze(results.flat());

const RECORD_KEYS: readonly string[] = Object.freeze(['name', 'backend']);

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
	typeof value === 'object' && value !== null && !Array.isArray(value);

// ---------------------------------------------------------------------------
// Field validators
// ---------------------------------------------------------------------------

/**
 * Semantic checks shared by the file loader and the CRUD operations.
 */
export const validateProfileName = (
	name: string,
	path = 'name',
): readonly ValidationIssue[] => {
	if (name.length === 0) return issue(path, 'Profile name cannot be empty');
	if (/[\r\n]/.test(name))
		return issue(path, 'Profile name cannot contain line breaks');
	// The pointer file is trimmed on read.
	if (name.trim() !== name)
		return issue(path, 'Profile name cannot start or end with whitespace');
	return ok;
};

export const validateBackend = (
	backend: string,
	path = 'backend',
): readonly ValidationIssue[] => {
	if (backend.length === 0) return issue(path, 'Backend URL cannot be empty');
	// Shell output must stay on one line.
	if (/[\r\n]/.test(backend))
		return issue(path, 'Backend URL cannot contain line breaks');
	return ok;
};

const validateStringField = (
	entry: Record<string, unknown>,
	key: 'name' | 'backend',
	path: string,
): readonly ValidationIssue[] => {
	const value = entry[key];
	if (value === undefined) return issue(path, `missing "${key}"`);
	if (typeof value !== 'string') return issue(path, `"${key}" must be a string`);
	return key === 'name'
		? validateProfileName(value, path)
		: validateBackend(value, path);
};

// ---------------------------------------------------------------------------
// Whole-file validation
// ---------------------------------------------------------------------------

export interface StoreParseResult {
	readonly records: readonly ProfileRecord[];
	readonly issues: readonly ValidationIssue[];
}

/**
 * Validate a parsed JSON value as a profile list. Records are only returned
 * when there are no issues.
 */
export const parseStoreContent = (raw: unknown): StoreParseResult => {
	if (!Array.isArray(raw)) {
		return {
			records: [],
			issues: issue('$', 'expected an array of profiles'),
		};
	}

	const records: ProfileRecord[] = [];
	const seen = new Map<string, number>();
	const found: Array<readonly ValidationIssue[]> = [];

	raw.forEach((entry: unknown, index) => {
		const at = `[${index}]`;
		if (!isPlainObject(entry)) {
			found.push(issue(at, 'expected an object with "name" and "backend"'));
			return;
		}

		const unknownKeys = Object.keys(entry).filter(
			(key) => !RECORD_KEYS.includes(key),
		);
		const fieldIssues = combine(
			validateStringField(entry, 'name', `${at}.name`),
			validateStringField(entry, 'backend', `${at}.backend`),
			...unknownKeys.map((key) => issue(`${at}.${key}`, 'unexpected field')),
		);
		if (fieldIssues.length > 0) {
			found.push(fieldIssues);
			return;
		}

		const { name, backend } = entry;
		if (typeof name !== 'string' || typeof backend !== 'string') return;

		const previous = seen.get(name);
		if (previous !== undefined) {
			found.push(
				issue(
					`${at}.name`,
					`duplicate profile name "${name}" (first at [${previous}])`,
				),
			);
			return;
		}
		seen.set(name, index);
		records.push(Object.freeze({ name, backend }));
	});

	const issues = combine(...found);
	return {
		records: issues.length === 0 ? Object.freeze(records) : [],
		issues,
	};
};
