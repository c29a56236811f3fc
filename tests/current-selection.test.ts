import {
	existsSync,
	mkdtempSync,
	readFileSync,
	rmSync,
	writeFileSync,
} from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { isInvalidProfileError, isNotFoundError } from '../src/errors/index.js';
import { createRecordStore } from '../src/profiles/record-store.js';
import type { RecordStore } from '../src/profiles/types.js';
import { createCurrentSelection } from '../src/selection/current-selection.js';

let dir: string;
let pointerPath: string;
let store: RecordStore;

const VARIABLE = 'PULUMI_BACKEND_URL';

beforeEach(() => {
	dir = mkdtempSync(join(tmpdir(), 'pulumi-profile-selection-'));
	pointerPath = join(dir, 'current_profile');
	store = createRecordStore({ path: join(dir, 'profiles.json') });
	store.add('dev', 's3://dev-bucket');
	store.add('prod', 's3://prod-bucket');
});

afterEach(() => {
	rmSync(dir, { recursive: true, force: true });
});

const selection = () =>
	createCurrentSelection({ pointerPath, store, variable: VARIABLE });

describe('activateKnown', () => {
	it('writes the name to the pointer file without a newline', () => {
		const result = selection().activateKnown('dev', true);
		expect(result).toEqual({
			kind: 'activated',
			name: 'dev',
			backend: 's3://dev-bucket',
			pointerPath,
		});
		expect(readFileSync(pointerPath, 'utf-8')).toBe('dev');
	});

	it('replaces an earlier selection', () => {
		const current = selection();
		current.activateKnown('dev', true);
		current.activateKnown('prod', true);
		expect(readFileSync(pointerPath, 'utf-8')).toBe('prod');
	});

	it('returns an export command and writes nothing when process-local', () => {
		expect(selection().activateKnown('prod', false)).toEqual({
			kind: 'shell',
			command: { action: 'export', variable: VARIABLE, value: 's3://prod-bucket' },
		});
		expect(existsSync(pointerPath)).toBe(false);
	});

	it('rejects a name that is not stored and leaves the pointer alone', () => {
		writeFileSync(pointerPath, 'dev');
		let error: unknown;
		try {
			selection().activateKnown('ghost', true);
		} catch (caught) {
			error = caught;
		}
		expect(isNotFoundError(error)).toBe(true);
		expect(readFileSync(pointerPath, 'utf-8')).toBe('dev');
	});

	it('creates the pointer directory when missing', () => {
		const nested = join(dir, 'a', 'b', 'current_profile');
		createCurrentSelection({ pointerPath: nested, store, variable: VARIABLE })
			.activateKnown('dev', true);
		expect(readFileSync(nested, 'utf-8')).toBe('dev');
	});
});

describe('setUnregistered', () => {
	it('writes a name that is not in the store', () => {
		expect(selection().setUnregistered('temp', true)).toEqual({
			kind: 'activated',
			name: 'temp',
			backend: undefined,
			pointerPath,
		});
		expect(readFileSync(pointerPath, 'utf-8')).toBe('temp');
		expect(store.get('temp')).toBeUndefined();
	});

	it('exports the name itself when process-local', () => {
		expect(selection().setUnregistered('temp', false)).toEqual({
			kind: 'shell',
			command: { action: 'export', variable: VARIABLE, value: 'temp' },
		});
		expect(existsSync(pointerPath)).toBe(false);
	});

	it('rejects an empty name', () => {
		expect(() => selection().setUnregistered('', true)).toThrow(
			'Invalid profile: Profile name cannot be empty',
		);
		let error: unknown;
		try {
			selection().setUnregistered('a\nb', true);
		} catch (caught) {
			error = caught;
		}
		expect(isInvalidProfileError(error)).toBe(true);
		expect(existsSync(pointerPath)).toBe(false);
	});

	it('rejects names the pointer file could not read back', () => {
		const current = selection();
		expect(() => current.setUnregistered(' dev ', true)).toThrow(
			'Invalid profile: Profile name cannot start or end with whitespace',
		);
		expect(() => current.setUnregistered('   ', false)).toThrow(
			'Invalid profile: Profile name cannot start or end with whitespace',
		);
		expect(existsSync(pointerPath)).toBe(false);
		expect(current.current()).toBeUndefined();
	});
});

describe('deactivate', () => {
	it('removes the pointer file', () => {
		const current = selection();
		current.activateKnown('dev', true);
		expect(current.deactivate(true)).toEqual({
			kind: 'deactivated',
			wasActive: true,
			pointerPath,
		});
		expect(existsSync(pointerPath)).toBe(false);
	});

	it('is a no-op without a pointer file', () => {
		expect(selection().deactivate(true)).toEqual({
			kind: 'deactivated',
			wasActive: false,
			pointerPath,
		});
	});

	it('returns an unset command when process-local', () => {
		writeFileSync(pointerPath, 'dev');
		expect(selection().deactivate(false)).toEqual({
			kind: 'shell',
			command: { action: 'unset', variable: VARIABLE },
		});
		expect(existsSync(pointerPath)).toBe(true);
	});
});

describe('current and resolveActive', () => {
	it('reads the trimmed pointer', () => {
		writeFileSync(pointerPath, '  dev\n');
		expect(selection().current()).toBe('dev');
	});

	it('is undefined for a missing or blank pointer', () => {
		expect(selection().current()).toBeUndefined();
		writeFileSync(pointerPath, '\n');
		expect(selection().current()).toBeUndefined();
		expect(selection().resolveActive()).toBeUndefined();
	});

	it('resolves a stored name to its backend', () => {
		writeFileSync(pointerPath, 'prod');
		expect(selection().resolveActive()).toEqual({
			name: 'prod',
			backend: 's3://prod-bucket',
			registered: true,
		});
	});

	it('resolves an unregistered name to itself', () => {
		writeFileSync(pointerPath, 'temp');
		expect(selection().resolveActive()).toEqual({
			name: 'temp',
			backend: 'temp',
			registered: false,
		});
	});

	it('exposes the pointer path', () => {
		expect(selection().getPointerPath()).toBe(pointerPath);
	});
});
