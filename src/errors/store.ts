// ---------------------------------------------------------------------------
// Store & Profile Errors
// ---------------------------------------------------------------------------

import type { AppError } from './base.js';
import { createAppError, isAppError } from './base.js';
import type { ValidationIssue } from './config.js';

export type MalformedStoreError = AppError & {
	readonly issues: readonly ValidationIssue[];
};

/**
 * The backing file exists but cannot be read as an ordered list of
 * `{ name, backend }` records, or it names a profile twice.
 */
export const createMalformedStoreError = (
	storePath: string,
	issues: readonly ValidationIssue[],
	options: { cause?: unknown } = {},
): MalformedStoreError => {
	const first = issues[0];
	const detail =
		issues.length === 1 && first
			? `${first.path}: ${first.message}`
			: `${issues.length} problems`;
	const frozenIssues = Object.freeze([...issues]);

	return Object.assign(
		createAppError(`Malformed profile store ${storePath} (${detail})`, {
			name: 'MalformedStoreError',
			code: 'STORE_MALFORMED',
			cause: options.cause,
			metadata: { storePath, issues: frozenIssues },
		}),
		{ issues: frozenIssues },
	);
};

export const createStoreIOError = (
	filePath: string,
	operation: 'read' | 'write' | 'remove',
	options: { cause?: unknown } = {},
): AppError => {
	const reason =
		options.cause instanceof Error ? `: ${options.cause.message}` : '';
	return createAppError(`Failed to ${operation} ${filePath}${reason}`, {
		name: 'StoreIOError',
		code: 'STORE_IO',
		cause: options.cause,
		metadata: { filePath, operation },
	});
};

export const createNotFoundError = (
	name: string,
	options: { storePath?: string } = {},
): AppError =>
	createAppError(`Profile '${name}' not found`, {
		name: 'NotFoundError',
		code: 'PROFILE_NOT_FOUND',
		metadata: { profileName: name, storePath: options.storePath },
	});

export const createDuplicateNameError = (
	name: string,
	options: { storePath?: string } = {},
): AppError =>
	createAppError(`Profile '${name}' already exists`, {
		name: 'DuplicateNameError',
		code: 'PROFILE_DUPLICATE',
		metadata: { profileName: name, storePath: options.storePath },
	});

export type InvalidProfileError = AppError & {
	readonly issues: readonly ValidationIssue[];
};

export const createInvalidProfileError = (
	issues: readonly ValidationIssue[],
): InvalidProfileError => {
	const frozenIssues = Object.freeze([...issues]);
	const message = frozenIssues.map((i) => i.message).join('; ');

	return Object.assign(
		createAppError(`Invalid profile: ${message}`, {
			name: 'InvalidProfileError',
			code: 'PROFILE_INVALID',
			metadata: { issues: frozenIssues },
		}),
		{ issues: frozenIssues },
	);
};

// ---------------------------------------------------------------------------
// Type Guards
// ---------------------------------------------------------------------------

export const isStoreError = (value: unknown): value is AppError =>
	isAppError(value) && value.code.startsWith('STORE_');

export const isMalformedStoreError = (
	value: unknown,
): value is MalformedStoreError =>
	isAppError(value) &&
	value.code === 'STORE_MALFORMED' &&
	'issues' in value &&
	Array.isArray(value.issues);

export const isStoreIOError = (value: unknown): value is AppError =>
	isAppError(value) && value.code === 'STORE_IO';

export const isProfileError = (value: unknown): value is AppError =>
	isAppError(value) && value.code.startsWith('PROFILE_');

export const isNotFoundError = (value: unknown): value is AppError =>
	isAppError(value) && value.code === 'PROFILE_NOT_FOUND';

export const isDuplicateNameError = (value: unknown): value is AppError =>
	isAppError(value) && value.code === 'PROFILE_DUPLICATE';

export const isInvalidProfileError = (
	value: unknown,
): value is InvalidProfileError =>
	isAppError(value) &&
	value.code === 'PROFILE_INVALID' &&
	'issues' in value &&
	Array.isArray(value.issues);
