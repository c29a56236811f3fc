import type { ProfileRecord } from '../src/profiles/types.js';
import type { SelectionResult } from '../src/selection/current-selection.js';
import {
	formatShellCommand,
	type ShellKind,
} from '../src/selection/shell-command.js';

export const BACKEND_HELP =
	'e.g., s3://my-bucket/state, file://./state, https://api.pulumi.com';

/** The line printed on stdout for a selection result. */
export function formatSelectionResult(
	result: SelectionResult,
	shell: ShellKind,
): string {
	switch (result.kind) {
		case 'shell':
			return formatShellCommand(result.command, shell);
		case 'activated':
			return result.backend === undefined
				? `Pulumi profile activated: ${result.name}`
				: `Pulumi profile activated: ${result.name} (${result.backend})`;
		case 'deactivated':
			return result.wasActive
				? 'Pulumi profile deactivated'
				: 'No active Pulumi profile to deactivate';
	}
}

/** `--list` output. `*` marks the active profile. */
export function formatProfileList(
	records: readonly ProfileRecord[],
	activeName: string | undefined,
): string[] {
	if (records.length === 0) return ['No profiles found.'];
	return [
		'Available profiles:',
		...records.map(
			({ name, backend }) =>
				`  ${name === activeName ? '*' : ' '} ${name} -> ${backend}`,
		),
	];
}

export const profileAdded = (name: string): string =>
	`Profile '${name}' added successfully`;

export const profileUpdated = (name: string): string =>
	`Profile '${name}' updated successfully`;

export const profileDeleted = (name: string): string =>
	`Profile '${name}' deleted successfully`;
