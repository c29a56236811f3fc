import { describe, expect, it } from 'vitest';
import {
	createAppError,
	createConfigParseError,
	createConfigValidationError,
	createDuplicateNameError,
	createInvalidProfileError,
	createMalformedStoreError,
	createNotFoundError,
	createStoreIOError,
	createTerminalInterruptedError,
	createTerminalIOError,
	createUsageError,
	isAppError,
	isConfigError,
	isConfigParseError,
	isConfigValidationError,
	isDuplicateNameError,
	isInvalidProfileError,
	isMalformedStoreError,
	isNotFoundError,
	isProfileError,
	isStoreError,
	isStoreIOError,
	isTerminalError,
	isTerminalInterruptedError,
	isTerminalIOError,
	isUsageError,
	toError,
	wrapError,
} from '../src/errors/index.js';

// ===========================================================================
// Base
// ===========================================================================

describe('createAppError', () => {
	it('should create an Error with structured fields', () => {
		const err = createAppError('boom', {
			code: 'X',
			metadata: { a: 1 },
		});
		expect(err).toBeInstanceOf(Error);
		expect(err.name).toBe('AppError');
		expect(err.code).toBe('X');
		expect(err.exitCode).toBe(1);
		expect(err.metadata).toEqual({ a: 1 });
		expect(Object.isFrozen(err.metadata)).toBe(true);
	});

	it('should default the code', () => {
		expect(createAppError('boom').code).toBe('APP_ERROR');
	});

	it('should serialise to JSON with the cause summarised', () => {
		const err = createAppError('outer', {
			name: 'OuterError',
			code: 'OUTER',
			exitCode: 3,
			cause: new TypeError('inner'),
		});
		const json = err.toJSON();
		expect(json.name).toBe('OuterError');
		expect(json.code).toBe('OUTER');
		expect(json.message).toBe('outer');
		expect(json.exitCode).toBe(3);
		expect(json.cause).toEqual({ name: 'TypeError', message: 'inner' });
	});
});

describe('isAppError', () => {
	it('should accept app errors only', () => {
		expect(isAppError(createAppError('x'))).toBe(true);
		expect(isAppError(new Error('x'))).toBe(false);
		expect(isAppError({ code: 'X', exitCode: 1, toJSON: () => ({}) })).toBe(
			false,
		);
		expect(isAppError(undefined)).toBe(false);
	});
});

describe('toError / wrapError', () => {
	it('should normalise thrown values', () => {
		const original = new Error('same');
		expect(toError(original)).toBe(original);
		expect(toError('text').message).toBe('text');
		expect(toError(42).message).toBe('42');
	});

	it('should wrap a cause', () => {
		const cause = new Error('root');
		const wrapped = wrapError('context', cause, 'WRAPPED');
		expect(wrapped.message).toBe('context');
		expect(wrapped.code).toBe('WRAPPED');
		expect(wrapped.cause).toBe(cause);
	});
});

// ===========================================================================
// Store & profile errors
// ===========================================================================

describe('store errors', () => {
	it('should describe a malformed store with one issue', () => {
		const err = createMalformedStoreError('/p/profiles.json', [
			{ path: '[0].name', message: 'missing "name"' },
		]);
		expect(err.message).toBe(
			'Malformed profile store /p/profiles.json ([0].name: missing "name")',
		);
		expect(err.name).toBe('MalformedStoreError');
		expect(err.code).toBe('STORE_MALFORMED');
		expect(isMalformedStoreError(err)).toBe(true);
		expect(isStoreError(err)).toBe(true);
		expect(isStoreIOError(err)).toBe(false);
	});

	it('should include the cause message in I/O errors', () => {
		const err = createStoreIOError('/p/profiles.json', 'write', {
			cause: new Error('EACCES: permission denied'),
		});
		expect(err.message).toBe(
			'Failed to write /p/profiles.json: EACCES: permission denied',
		);
		expect(err.metadata).toEqual({
			filePath: '/p/profiles.json',
			operation: 'write',
		});
		expect(isStoreIOError(err)).toBe(true);
	});

	it('should name the profile in lookup errors', () => {
		const missing = createNotFoundError('dev', { storePath: '/p' });
		expect(missing.message).toBe("Profile 'dev' not found");
		expect(missing.metadata.profileName).toBe('dev');
		expect(isNotFoundError(missing)).toBe(true);
		expect(isProfileError(missing)).toBe(true);

		const duplicate = createDuplicateNameError('dev');
		expect(duplicate.message).toBe("Profile 'dev' already exists");
		expect(isDuplicateNameError(duplicate)).toBe(true);
		expect(isNotFoundError(duplicate)).toBe(false);
	});

	it('should join invalid-profile issues', () => {
		const err = createInvalidProfileError([
			{ path: 'name', message: 'Profile name cannot be empty' },
			{ path: 'backend', message: 'Backend URL cannot be empty' },
		]);
		expect(err.message).toBe(
			'Invalid profile: Profile name cannot be empty; Backend URL cannot be empty',
		);
		expect(err.issues).toHaveLength(2);
		expect(isInvalidProfileError(err)).toBe(true);
	});
});

// ===========================================================================
// Terminal errors
// ===========================================================================

describe('terminal errors', () => {
	it('should exit with 128 + signal number when interrupted', () => {
		const term = createTerminalInterruptedError('SIGTERM');
		expect(term.message).toBe('Interrupted by SIGTERM');
		expect(term.exitCode).toBe(143);
		expect(createTerminalInterruptedError('SIGHUP').exitCode).toBe(129);
		expect(isTerminalInterruptedError(term)).toBe(true);
		expect(isTerminalError(term)).toBe(true);
	});

	it('should keep the cause of I/O failures', () => {
		const cause = new Error('setRawMode failed');
		const err = createTerminalIOError('Terminal UI failed', { cause });
		expect(err.cause).toBe(cause);
		expect(err.exitCode).toBe(1);
		expect(isTerminalIOError(err)).toBe(true);
		expect(isTerminalInterruptedError(err)).toBe(false);
	});
});

// ===========================================================================
// Configuration & usage errors
// ===========================================================================

describe('configuration errors', () => {
	it('should summarise a single validation issue', () => {
		const err = createConfigValidationError([
			{ path: 'pageSize', message: 'pageSize must be an integer from 1 to 50' },
		]);
		expect(err.message).toBe(
			'Invalid configuration: pageSize must be an integer from 1 to 50',
		);
		expect(isConfigValidationError(err)).toBe(true);
		expect(isConfigError(err)).toBe(true);
	});

	it('should count several validation issues', () => {
		const err = createConfigValidationError(
			[
				{ path: 'a', message: 'x' },
				{ path: 'b', message: 'y' },
			],
			{ configPath: '/p/profile-selector.json' },
		);
		expect(err.message).toBe('Invalid configuration: 2 validation errors');
		expect(err.metadata.configPath).toBe('/p/profile-selector.json');
	});

	it('should report parse and usage errors', () => {
		const parse = createConfigParseError('/p/profile-selector.json');
		expect(parse.message).toBe(
			'Failed to parse configuration file: /p/profile-selector.json',
		);
		expect(isConfigParseError(parse)).toBe(true);

		const usage = createUsageError('Unknown option: --nope');
		expect(usage.code).toBe('CLI_USAGE');
		expect(isUsageError(usage)).toBe(true);
		expect(isConfigError(usage)).toBe(false);
	});
});
