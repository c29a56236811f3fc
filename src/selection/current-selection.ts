/**
 * pulumi-profile — Current Selection
 *
 * Tracks which profile is active. Persistent activation writes the name to
 * a pointer file (~/.pulumi/current_profile) that shell integrations read
 * on startup; process-local activation returns a shell command for the
 * caller to print instead of writing anything.
 */

import {
	createInvalidProfileError,
	createNotFoundError,
} from '../errors/index.js';
import { createNoopLogger, type Logger } from '../logger.js';
import { readTextFile, removeFile, writeFileAtomic } from '../profiles/file-io.js';
import { validateProfileName } from '../profiles/schema.js';
import type { RecordStore } from '../profiles/types.js';
import type { ShellCommand } from './shell-command.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type SelectionResult =
	| {
			readonly kind: 'activated';
			readonly name: string;
			/** Undefined for a name that is not in the store. */
			readonly backend: string | undefined;
			readonly pointerPath: string;
	  }
	| {
			readonly kind: 'deactivated';
			/** Whether a pointer file existed before. */
			readonly wasActive: boolean;
			readonly pointerPath: string;
	  }
	| {
			readonly kind: 'shell';
			readonly command: ShellCommand;
	  };

export interface ActiveProfile {
	readonly name: string;
	/** The stored backend, or the name itself for an unregistered profile. */
	readonly backend: string;
	readonly registered: boolean;
}

export interface CurrentSelection {
	readonly activateKnown: (name: string, persistent: boolean) => SelectionResult;
	readonly setUnregistered: (
		name: string,
		persistent: boolean,
	) => SelectionResult;
	readonly deactivate: (persistent: boolean) => SelectionResult;
	/** Name held by the pointer file, trimmed. */
	readonly current: () => string | undefined;
	/** Resolve the pointer against the store the way a shell integration does. */
	readonly resolveActive: () => ActiveProfile | undefined;
	readonly getPointerPath: () => string;
}

export interface CurrentSelectionOptions {
	readonly pointerPath: string;
	readonly store: RecordStore;
	/** Environment variable carrying the backend. */
	readonly variable: string;
	readonly logger?: Logger;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createCurrentSelection(
	options: CurrentSelectionOptions,
): CurrentSelection {
	const { pointerPath, store, variable } = options;
	const logger = (options.logger ?? createNoopLogger()).child('selection');

	const apply = (
		name: string,
		backend: string | undefined,
		persistent: boolean,
	): SelectionResult => {
		if (!persistent) {
			return {
				kind: 'shell',
				command: { action: 'export', variable, value: backend ?? name },
			};
		}
		writeFileAtomic(pointerPath, name);
		logger.debug('Wrote pointer', { pointerPath, name });
		return { kind: 'activated', name, backend, pointerPath };
	};

	const activateKnown = (name: string, persistent: boolean): SelectionResult => {
		const record = store.get(name);
		if (!record) {
			throw createNotFoundError(name, { storePath: store.getPath() });
		}
		return apply(record.name, record.backend, persistent);
	};

	const setUnregistered = (
		name: string,
		persistent: boolean,
	): SelectionResult => {
		const issues = validateProfileName(name);
		if (issues.length > 0) throw createInvalidProfileError(issues);
		return apply(name, undefined, persistent);
	};

	const deactivate = (persistent: boolean): SelectionResult => {
		if (!persistent) {
			return { kind: 'shell', command: { action: 'unset', variable } };
		}
		const wasActive = removeFile(pointerPath);
		logger.debug('Cleared pointer', { pointerPath, wasActive });
		return { kind: 'deactivated', wasActive, pointerPath };
	};

	const current = (): string | undefined => {
		const name = readTextFile(pointerPath)?.trim();
		return name ? name : undefined;
	};

	const resolveActive = (): ActiveProfile | undefined => {
		const name = current();
		if (name === undefined) return undefined;
		const record = store.get(name);
		return record
			? { name, backend: record.backend, registered: true }
			: { name, backend: name, registered: false };
	};

	return Object.freeze({
		activateKnown,
		setUnregistered,
		deactivate,
		current,
		resolveActive,
		getPointerPath: () => pointerPath,
	});
}
