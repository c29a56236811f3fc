import type { Settings } from '../src/config/settings.js';
import type { Logger } from '../src/logger.js';
import { createRecordStore } from '../src/profiles/record-store.js';
import type { RecordStore } from '../src/profiles/types.js';
import {
	type CurrentSelection,
	createCurrentSelection,
} from '../src/selection/current-selection.js';
import type { ShellKind } from '../src/selection/shell-command.js';

/**
 * Everything one invocation works with, built once from resolved settings.
 */
export interface CliContext {
	readonly settings: Settings;
	readonly logger: Logger;
	readonly store: RecordStore;
	readonly selection: CurrentSelection;
	/** Output syntax for shell commands. */
	readonly shell: ShellKind;
}

export function createCliContext(
	settings: Settings,
	logger: Logger,
): CliContext {
	const store = createRecordStore({ path: settings.storePath, logger });
	const selection = createCurrentSelection({
		pointerPath: settings.pointerPath,
		store,
		variable: settings.variable,
		logger,
	});
	return Object.freeze({
		settings,
		logger,
		store,
		selection,
		shell: settings.shell,
	});
}
