import { describe, expect, it } from 'vitest';
import { isUsageError } from '../../src/errors/index.js';
import { parseArgs } from '../args.js';

const usageMessage = (argv: string[]): string | undefined => {
	try {
		parseArgs(argv);
	} catch (error) {
		return isUsageError(error) ? error.message : undefined;
	}
	return undefined;
};

describe('parseArgs', () => {
	it('defaults to interactive selection', () => {
		expect(parseArgs([])).toEqual({
			command: { kind: 'select' },
			current: false,
			overrides: {},
		});
	});

	it('reads current-shell mode', () => {
		expect(parseArgs(['-c'])).toEqual({
			command: { kind: 'select' },
			current: true,
			overrides: {},
		});
	});

	it('reads modes with values', () => {
		expect(parseArgs(['-a', 'dev']).command).toEqual({
			kind: 'activate',
			name: 'dev',
		});
		expect(parseArgs(['--new', 'temp']).command).toEqual({
			kind: 'new',
			name: 'temp',
		});
		expect(parseArgs(['--delete', 'old']).command).toEqual({
			kind: 'delete',
			name: 'old',
		});
		expect(parseArgs(['--edit', 'dev', '--backend', 's3://b']).command).toEqual(
			{ kind: 'edit', name: 'dev', backend: 's3://b' },
		);
	});

	it('reads flag-only modes', () => {
		expect(parseArgs(['-d']).command).toEqual({ kind: 'deactivate' });
		expect(parseArgs(['--resolve']).command).toEqual({ kind: 'resolve' });
		expect(parseArgs(['-l']).command).toEqual({ kind: 'list' });
	});

	it('collects --add values in any order', () => {
		expect(
			parseArgs(['--backend', 's3://a', '--add', '--name', 'dev']).command,
		).toEqual({ kind: 'add', name: 'dev', backend: 's3://a' });
		expect(parseArgs(['--add']).command).toEqual({ kind: 'add' });
	});

	it('turns settings flags into overrides', () => {
		expect(
			parseArgs(['-a', 'dev', '-c', '--shell', 'fish', '--data-dir', '/tmp/p']),
		).toEqual({
			command: { kind: 'activate', name: 'dev' },
			current: true,
			overrides: { dataDir: '/tmp/p', shell: 'fish' },
		});
	});

	it('stops at help and version', () => {
		expect(parseArgs(['-l', '--help']).command).toEqual({ kind: 'help' });
		expect(parseArgs(['-v']).command).toEqual({ kind: 'version' });
	});

	it('rejects bad input with usage errors', () => {
		expect(usageMessage(['-a'])).toBe('Option --activate requires a value');
		expect(usageMessage(['-a', '-l'])).toBe(
			'Option --activate requires a value',
		);
		expect(usageMessage(['-l', '-d'])).toBe(
			'Options --list and --deactivate cannot be combined',
		);
		expect(usageMessage(['--bogus'])).toBe('Unknown option: --bogus');
		expect(usageMessage(['dev'])).toBe('Unexpected argument: dev');
		expect(usageMessage(['--shell', 'tcsh'])).toBe(
			'Invalid shell "tcsh": expected posix, fish or nu',
		);
		expect(usageMessage(['--name', 'x'])).toBe(
			'Option --name can only be used with --add',
		);
		expect(usageMessage(['-a', 'dev', '--backend', 'x'])).toBe(
			'Option --backend can only be used with --add or --edit',
		);
		expect(usageMessage(['-l', '-c'])).toBe(
			'Option --current can only be used with interactive selection, --activate, --new or --deactivate',
		);
	});
});
