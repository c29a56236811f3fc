import { createUsageError } from '../src/errors/index.js';
import type { SettingsOverrides } from '../src/config/settings.js';
import { isShellKind, type ShellKind } from '../src/selection/shell-command.js';

export const VERSION = '0.1.0';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type CliCommand =
	| { readonly kind: 'select' }
	| { readonly kind: 'activate'; readonly name: string }
	| { readonly kind: 'new'; readonly name: string }
	| { readonly kind: 'deactivate' }
	| { readonly kind: 'resolve' }
	| { readonly kind: 'list' }
	| { readonly kind: 'add'; readonly name?: string; readonly backend?: string }
	| { readonly kind: 'edit'; readonly name: string; readonly backend?: string }
	| { readonly kind: 'delete'; readonly name: string }
	| { readonly kind: 'help' }
	| { readonly kind: 'version' };

export interface CliArgs {
	readonly command: CliCommand;
	/** Print a shell command instead of writing the pointer file. */
	readonly current: boolean;
	/** Flags that take precedence over every other settings source. */
	readonly overrides: SettingsOverrides;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

// Flags that pick what the invocation does; at most one may be given.
const MODE_FLAGS: Readonly<Record<string, string>> = Object.freeze({
	'-a': '--activate',
	'--activate': '--activate',
	'-n': '--new',
	'--new': '--new',
	'-d': '--deactivate',
	'--deactivate': '--deactivate',
	'-r': '--resolve',
	'--resolve': '--resolve',
	'-l': '--list',
	'--list': '--list',
	'--add': '--add',
	'--edit': '--edit',
	'--delete': '--delete',
});

const TAKES_VALUE = new Set([
	'--activate',
	'--new',
	'--edit',
	'--delete',
	'--name',
	'--backend',
	'--shell',
	'--data-dir',
]);

// Modes that write the pointer file, and so have a current-shell variant.
const SHELL_CAPABLE = new Set(['select', 'activate', 'new', 'deactivate']);

/**
 * Parse command-line arguments (without the node and script entries).
 * Throws a usage error for unknown flags, missing values and conflicting
 * modes.
 */
export function parseArgs(argv: readonly string[]): CliArgs {
	let mode: { readonly flag: string; readonly value?: string } | undefined;
	let current = false;
	let name: string | undefined;
	let backend: string | undefined;
	let shell: ShellKind | undefined;
	let dataDir: string | undefined;

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i] ?? '';

		if (arg === '-h' || arg === '--help') {
			return { command: { kind: 'help' }, current: false, overrides: {} };
		}
		if (arg === '-v' || arg === '--version') {
			return { command: { kind: 'version' }, current: false, overrides: {} };
		}
		if (arg === '-c' || arg === '--current') {
			current = true;
			continue;
		}

		const flag = MODE_FLAGS[arg] ?? arg;
		let value: string | undefined;
		if (TAKES_VALUE.has(flag)) {
			value = argv[i + 1];
			if (value === undefined || value.startsWith('-')) {
				throw createUsageError(`Option ${flag} requires a value`);
			}
			i++;
		}

		if (MODE_FLAGS[arg]) {
			if (mode) {
				throw createUsageError(
					`Options ${mode.flag} and ${flag} cannot be combined`,
				);
			}
			mode = { flag, value };
			continue;
		}

		switch (flag) {
			case '--name':
				name = value;
				break;
			case '--backend':
				backend = value;
				break;
			case '--data-dir':
				dataDir = value;
				break;
			case '--shell':
				if (!isShellKind(value)) {
					throw createUsageError(
						`Invalid shell "${value ?? ''}": expected posix, fish or nu`,
					);
				}
				shell = value;
				break;
			default:
				throw createUsageError(
					arg.startsWith('-')
						? `Unknown option: ${arg}`
						: `Unexpected argument: ${arg}`,
				);
		}
	}

	const command = toCommand(mode, name, backend);

	if (name !== undefined && command.kind !== 'add') {
		throw createUsageError('Option --name can only be used with --add');
	}
	if (
		backend !== undefined &&
		command.kind !== 'add' &&
		command.kind !== 'edit'
	) {
		throw createUsageError(
			'Option --backend can only be used with --add or --edit',
		);
	}
	if (current && !SHELL_CAPABLE.has(command.kind)) {
		throw createUsageError(
			'Option --current can only be used with interactive selection, --activate, --new or --deactivate',
		);
	}

	return {
		command,
		current,
		overrides: {
			...(dataDir === undefined ? {} : { dataDir }),
			...(shell === undefined ? {} : { shell }),
		},
	};
}

function toCommand(
	mode: { readonly flag: string; readonly value?: string } | undefined,
	name: string | undefined,
	backend: string | undefined,
): CliCommand {
	if (!mode) return { kind: 'select' };
	const value = mode.value ?? '';

	switch (mode.flag) {
		case '--activate':
			return { kind: 'activate', name: value };
		case '--new':
			return { kind: 'new', name: value };
		case '--deactivate':
			return { kind: 'deactivate' };
		case '--resolve':
			return { kind: 'resolve' };
		case '--list':
			return { kind: 'list' };
		case '--add':
			return { kind: 'add', name, backend };
		case '--edit':
			return { kind: 'edit', name: value, backend };
		case '--delete':
			return { kind: 'delete', name: value };
		default:
			throw createUsageError(`Unknown option: ${mode.flag}`);
	}
}

// ---------------------------------------------------------------------------
// Help
// ---------------------------------------------------------------------------

export const USAGE = `pulumi-profile — select the Pulumi backend for your shell

Usage:
  pulumi-profile [options]

With no mode option, opens the interactive selector.

Modes:
  -a, --activate <name>     Activate a stored profile
  -n, --new <name>          Activate a name that is not in the store
  -d, --deactivate          Clear the active profile
  -r, --resolve             Print the shell command for the persisted selection
  -l, --list                List profiles (* marks the active one)
      --add                 Add a profile (prompts for missing values)
      --edit <name>         Change a profile's backend
      --delete <name>       Delete a profile

Options:
  -c, --current             Current shell only: print a shell command to eval
                            instead of writing the pointer file
      --name <name>         Name for --add
      --backend <url>       Backend for --add / --edit
      --shell <kind>        Output syntax for -c / -r: posix|fish|nu
                            (default: from $SHELL)
      --data-dir <path>     Data directory (default: ~/.pulumi)
  -h, --help                Show this help
  -v, --version             Show the version

Files (in the data directory):
  profiles.json             Stored profiles
  current_profile           Name of the active profile
  profile-selector.json     Optional settings (variable, pageSize, logLevel, shell)

Environment:
  PULUMI_PROFILE_HOME       Data directory
  PULUMI_PROFILE_PAGE_SIZE  Rows shown by the selector (1-50)
  PULUMI_PROFILE_LOG_LEVEL  debug|info|warn|error|none
`;
