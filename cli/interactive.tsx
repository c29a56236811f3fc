/**
 * pulumi-profile — Interactive terminal sessions
 *
 * Every prompt runs as a short-lived Ink app rendered inline on stderr, so
 * stdout stays free for the shell command printed in current-shell mode.
 * Ink holds raw mode only while an app is mounted and releases it on
 * unmount; SIGTERM / SIGHUP unmount the app before the error propagates.
 */

import { type Instance, render, useApp } from 'ink';
import type { ReactElement } from 'react';
import {
	createTerminalInterruptedError,
	createTerminalIOError,
	toError,
} from '../src/errors/index.js';
import type { Logger } from '../src/logger.js';
import type { ProfileRecord } from '../src/profiles/types.js';
import type { SelectorOutcome } from '../src/selector/session.js';
import { ConfirmPrompt } from './components/confirm-prompt.js';
import { ProfileSelector } from './components/profile-selector.js';
import { TextPrompt } from './components/text-prompt.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SelectProfileOptions {
	readonly pageSize?: number;
	readonly initialName?: string;
}

export interface TextQuestion {
	readonly message: string;
	readonly help?: string;
	readonly initialValue?: string;
	readonly validate?: (value: string) => string | undefined;
}

/**
 * What the dispatcher needs from the terminal. Tests substitute a scripted
 * implementation.
 */
export interface Interaction {
	readonly selectProfile: (
		records: readonly ProfileRecord[],
		options?: SelectProfileOptions,
	) => Promise<SelectorOutcome>;
	/** Resolves to undefined when the user cancels. */
	readonly promptText: (question: TextQuestion) => Promise<string | undefined>;
	readonly confirm: (message: string) => Promise<boolean>;
}

export interface TerminalStreams {
	readonly stdin: NodeJS.ReadStream;
	readonly output: NodeJS.WriteStream;
}

// ---------------------------------------------------------------------------
// Scoped Ink run
// ---------------------------------------------------------------------------

const HANDLED_SIGNALS: readonly NodeJS.Signals[] = Object.freeze([
	'SIGTERM',
	'SIGHUP',
]);

function Session<T>({
	build,
	onResult,
}: {
	readonly build: (finish: (value: T) => void) => ReactElement;
	readonly onResult: (value: T) => void;
}) {
	const { exit } = useApp();
	return build((value) => {
		onResult(value);
		exit();
	});
}

/**
 * Mount an Ink element until it reports a value, then unmount and return
 * that value.
 */
export async function runInk<T>(
	build: (finish: (value: T) => void) => ReactElement,
	streams: TerminalStreams,
): Promise<T> {
	if (!streams.stdin.isTTY) {
		throw createTerminalIOError(
			'Interactive mode needs a terminal: stdin is not a TTY',
		);
	}

	let result: { readonly value: T } | undefined;
	let interrupted: NodeJS.Signals | undefined;
	let instance: Instance;

	try {
		instance = render(
			<Session<T>
				build={build}
				onResult={(value) => {
					result ??= { value };
				}}
			/>,
			{
				stdin: streams.stdin,
				stdout: streams.output,
				stderr: streams.output,
				exitOnCtrlC: false,
				patchConsole: false,
			},
		);
	} catch (error) {
		throw createTerminalIOError(
			`Failed to start the terminal UI: ${toError(error).message}`,
			{ cause: error },
		);
	}

	const onSignal = (signal: NodeJS.Signals): void => {
		interrupted = signal;
		instance.unmount();
	};
	for (const signal of HANDLED_SIGNALS) process.once(signal, onSignal);

	try {
		await instance.waitUntilExit();
	} catch (error) {
		throw createTerminalIOError(
			`Terminal UI failed: ${toError(error).message}`,
			{ cause: error },
		);
	} finally {
		for (const signal of HANDLED_SIGNALS) {
			process.removeListener(signal, onSignal);
		}
		instance.cleanup();
	}

	if (interrupted) throw createTerminalInterruptedError(interrupted);
	if (!result) {
		throw createTerminalIOError('Terminal UI closed without an answer');
	}
	return result.value;
}

// ---------------------------------------------------------------------------
// Interaction backed by the real terminal
// ---------------------------------------------------------------------------

export function createTerminalInteraction(
	options: { readonly streams?: TerminalStreams; readonly logger?: Logger } = {},
): Interaction {
	const streams = options.streams ?? {
		stdin: process.stdin,
		output: process.stderr,
	};
	const logger = options.logger?.child('terminal');

	const selectProfile = async (
		records: readonly ProfileRecord[],
		selectOptions: SelectProfileOptions = {},
	): Promise<SelectorOutcome> => {
		const outcome = await runInk<SelectorOutcome>(
			(finish) => (
				<ProfileSelector
					records={records}
					pageSize={selectOptions.pageSize}
					initialName={selectOptions.initialName}
					onDone={finish}
				/>
			),
			streams,
		);
		logger?.debug('Selector finished', { outcome });
		return outcome;
	};

	const promptText = (question: TextQuestion): Promise<string | undefined> =>
		runInk<string | undefined>(
			(finish) => (
				<TextPrompt
					message={question.message}
					help={question.help}
					initialValue={question.initialValue}
					validate={question.validate}
					onSubmit={finish}
					onCancel={() => finish(undefined)}
				/>
			),
			streams,
		);

	const confirm = (message: string): Promise<boolean> =>
		runInk<boolean>(
			(finish) => <ConfirmPrompt message={message} onAnswer={finish} />,
			streams,
		);

	return Object.freeze({ selectProfile, promptText, confirm });
}
