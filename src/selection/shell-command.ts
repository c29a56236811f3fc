// ---------------------------------------------------------------------------
// Shell commands for current-shell activation
// ---------------------------------------------------------------------------
//
// The tool never touches its own environment. In current-shell mode it
// prints one line that the calling shell evaluates:
//
//   posix    export PULUMI_BACKEND_URL="s3://bucket"   /  unset PULUMI_BACKEND_URL
//   fish     set -gx PULUMI_BACKEND_URL "s3://bucket"  /  set -e PULUMI_BACKEND_URL
//   nu       $env.PULUMI_BACKEND_URL = "s3://bucket"   /  hide-env PULUMI_BACKEND_URL
// ---------------------------------------------------------------------------

import { basename } from 'node:path';

export type ShellKind = 'posix' | 'fish' | 'nu';

export const SHELL_KINDS: readonly ShellKind[] = Object.freeze([
	'posix',
	'fish',
	'nu',
]);

export const isShellKind = (value: unknown): value is ShellKind =>
	typeof value === 'string' && SHELL_KINDS.some((kind) => kind === value);

export type ShellCommand =
	| {
			readonly action: 'export';
			readonly variable: string;
			readonly value: string;
	  }
	| {
			readonly action: 'unset';
			readonly variable: string;
	  };

/**
 * Pick the output syntax from a `$SHELL` value. Anything that is not fish
 * or nushell gets POSIX syntax.
 */
export function detectShell(shellPath: string | undefined): ShellKind {
	if (!shellPath) return 'posix';
	const name = basename(shellPath).toLowerCase();
	if (name === 'fish') return 'fish';
	if (name === 'nu' || name === 'nushell') return 'nu';
	return 'posix';
}

const escapers: Readonly<Record<ShellKind, (value: string) => string>> =
	Object.freeze({
		posix: (value) => value.replace(/[\\"$`]/g, (ch) => `\\${ch}`),
		fish: (value) => value.replace(/[\\"$]/g, (ch) => `\\${ch}`),
		nu: (value) => value.replace(/[\\"]/g, (ch) => `\\${ch}`),
	});

export function quoteForShell(value: string, shell: ShellKind): string {
	return `"${escapers[shell](value)}"`;
}

export function formatShellCommand(
	command: ShellCommand,
	shell: ShellKind,
): string {
	const { variable } = command;

	if (command.action === 'unset') {
		switch (shell) {
			case 'fish':
				return `set -e ${variable}`;
			case 'nu':
				return `hide-env ${variable}`;
			case 'posix':
				return `unset ${variable}`;
		}
	}

	const quoted = quoteForShell(command.value, shell);
	switch (shell) {
		case 'fish':
			return `set -gx ${variable} ${quoted}`;
		case 'nu':
			return `$env.${variable} = ${quoted}`;
		case 'posix':
			return `export ${variable}=${quoted}`;
	}
}
