/**
 * pulumi-profile — Command dispatcher
 *
 * Routes a parsed invocation to the store and the current selection, runs
 * the prompts it needs, and turns every outcome into output lines and an
 * exit code. stdout carries only results (in current-shell mode, the shell
 * command to eval); status chatter and errors go to stderr.
 */

import { resolveSettings } from '../src/config/settings.js';
import {
	createNotFoundError,
	isAppError,
	toError,
} from '../src/errors/index.js';
import { createLogger, type Logger } from '../src/logger.js';
import { validateBackend, validateProfileName } from '../src/profiles/schema.js';
import type { ProfileRecord } from '../src/profiles/types.js';
import { formatShellCommand } from '../src/selection/shell-command.js';
import { type CliArgs, parseArgs, USAGE, VERSION } from './args.js';
import { type CliContext, createCliContext } from './context.js';
import {
	BACKEND_HELP,
	formatProfileList,
	formatSelectionResult,
	profileAdded,
	profileDeleted,
	profileUpdated,
} from './format.js';
import { createTerminalInteraction, type Interaction } from './interactive.js';

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_CANCELLED = 2;

export interface CliIO {
	/** One line of command output (stdout). */
	readonly out: (line: string) => void;
	/** One line of status or error output (stderr). */
	readonly err: (line: string) => void;
}

export const consoleIO: CliIO = Object.freeze({
	out: (line: string) => {
		process.stdout.write(`${line}\n`);
	},
	err: (line: string) => {
		process.stderr.write(`${line}\n`);
	},
});

// ---------------------------------------------------------------------------
// Prompts
// ---------------------------------------------------------------------------

const firstIssue = (
	issues: readonly { readonly message: string }[],
): string | undefined => issues[0]?.message;

async function askName(
	ctx: CliContext,
	interaction: Interaction,
): Promise<string | undefined> {
	return interaction.promptText({
		message: 'Profile name:',
		validate: (value) =>
			firstIssue(validateProfileName(value)) ??
			(ctx.store.get(value) ? `Profile '${value}' already exists` : undefined),
	});
}

async function askBackend(
	interaction: Interaction,
	message: string,
	initialValue?: string,
): Promise<string | undefined> {
	return interaction.promptText({
		message,
		help: BACKEND_HELP,
		initialValue,
		validate: (value) => firstIssue(validateBackend(value)),
	});
}

// ---------------------------------------------------------------------------
// Profile management
// ---------------------------------------------------------------------------

/** Resolves to the added record, or undefined when a prompt was cancelled. */
async function addProfile(
	ctx: CliContext,
	interaction: Interaction,
	preset: { readonly name?: string; readonly backend?: string } = {},
): Promise<ProfileRecord | undefined> {
	const name = preset.name ?? (await askName(ctx, interaction));
	if (name === undefined) return undefined;
	const backend =
		preset.backend ?? (await askBackend(interaction, 'Backend URL:'));
	if (backend === undefined) return undefined;
	return ctx.store.add(name, backend);
}

async function editProfile(
	ctx: CliContext,
	interaction: Interaction,
	name: string,
	presetBackend?: string,
): Promise<ProfileRecord | undefined> {
	const existing = ctx.store.get(name);
	if (!existing) {
		throw createNotFoundError(name, { storePath: ctx.store.getPath() });
	}
	const backend =
		presetBackend ??
		(await askBackend(interaction, 'New backend URL:', existing.backend));
	if (backend === undefined) return undefined;
	return ctx.store.edit(name, backend);
}

// ---------------------------------------------------------------------------
// Interactive selection
// ---------------------------------------------------------------------------

/**
 * Open the selector until the user picks or cancels. Add / edit / delete
 * requests run their prompts, update the store and reopen the selector.
 */
async function selectInteractively(
	ctx: CliContext,
	args: CliArgs,
	io: CliIO,
	interaction: Interaction,
): Promise<number> {
	const persistent = !args.current;
	let initialName = ctx.selection.current();

	for (;;) {
		const outcome = await interaction.selectProfile(ctx.store.list(), {
			pageSize: ctx.settings.pageSize,
			initialName,
		});
		ctx.logger.debug('Selector outcome', { outcome });

		switch (outcome.kind) {
			case 'cancelled':
				io.err('No profile selected');
				return EXIT_CANCELLED;

			case 'selected':
				io.out(
					formatSelectionResult(
						ctx.selection.activateKnown(outcome.name, persistent),
						ctx.shell,
					),
				);
				return EXIT_OK;

			case 'add-requested': {
				const added = await addProfile(ctx, interaction);
				if (added) {
					io.err(profileAdded(added.name));
					initialName = added.name;
				}
				break;
			}

			case 'edit-requested': {
				const edited = await editProfile(ctx, interaction, outcome.name);
				if (edited) io.err(profileUpdated(edited.name));
				initialName = outcome.name;
				break;
			}

			case 'delete-requested': {
				const confirmed = await interaction.confirm(
					`Delete profile '${outcome.name}'?`,
				);
				if (confirmed) {
					ctx.store.delete(outcome.name);
					io.err(profileDeleted(outcome.name));
				} else {
					initialName = outcome.name;
				}
				break;
			}
		}
	}
}

// ---------------------------------------------------------------------------
// Routing
// ---------------------------------------------------------------------------

export async function runCommand(
	ctx: CliContext,
	args: CliArgs,
	io: CliIO,
	interaction: Interaction,
): Promise<number> {
	const { command } = args;
	const persistent = !args.current;

	switch (command.kind) {
		case 'help':
			io.out(USAGE.trimEnd());
			return EXIT_OK;

		case 'version':
			io.out(VERSION);
			return EXIT_OK;

		case 'select':
			return selectInteractively(ctx, args, io, interaction);

		case 'activate':
			io.out(
				formatSelectionResult(
					ctx.selection.activateKnown(command.name, persistent),
					ctx.shell,
				),
			);
			return EXIT_OK;

		case 'new':
			io.out(
				formatSelectionResult(
					ctx.selection.setUnregistered(command.name, persistent),
					ctx.shell,
				),
			);
			return EXIT_OK;

		case 'deactivate':
			io.out(
				formatSelectionResult(ctx.selection.deactivate(persistent), ctx.shell),
			);
			return EXIT_OK;

		case 'resolve': {
			const active = ctx.selection.resolveActive();
			const variable = ctx.settings.variable;
			io.out(
				formatShellCommand(
					active
						? { action: 'export', variable, value: active.backend }
						: { action: 'unset', variable },
					ctx.shell,
				),
			);
			return EXIT_OK;
		}

		case 'list':
			for (const line of formatProfileList(
				ctx.store.list(),
				ctx.selection.current(),
			)) {
				io.out(line);
			}
			return EXIT_OK;

		case 'add': {
			const added = await addProfile(ctx, interaction, command);
			if (!added) {
				io.err('Cancelled');
				return EXIT_CANCELLED;
			}
			io.out(profileAdded(added.name));
			return EXIT_OK;
		}

		case 'edit': {
			const edited = await editProfile(
				ctx,
				interaction,
				command.name,
				command.backend,
			);
			if (!edited) {
				io.err('Cancelled');
				return EXIT_CANCELLED;
			}
			io.out(profileUpdated(edited.name));
			return EXIT_OK;
		}

		case 'delete':
			ctx.store.delete(command.name);
			io.out(profileDeleted(command.name));
			return EXIT_OK;
	}
}

// ---------------------------------------------------------------------------
// Entry
// ---------------------------------------------------------------------------

export interface RunCliOptions {
	readonly env?: NodeJS.ProcessEnv;
	readonly homeDir?: string;
	readonly io?: CliIO;
	readonly interaction?: Interaction;
	readonly logger?: Logger;
}

/** Print a failure as one line and pick the exit code. */
export function reportError(
	error: unknown,
	io: CliIO,
	logger?: Logger,
): number {
	const err = toError(error);
	logger?.debug(
		'Command failed',
		isAppError(err) ? err.toJSON() : { error: err.message },
	);
	io.err(`Error: ${err.message.replace(/\s*\n\s*/g, ' ')}`);
	return isAppError(err) ? err.exitCode : EXIT_ERROR;
}

/**
 * Parse, resolve settings, and run one invocation. Never throws; every
 * failure becomes an exit code.
 */
export async function runCli(
	argv: readonly string[],
	options: RunCliOptions = {},
): Promise<number> {
	const io = options.io ?? consoleIO;
	let logger = options.logger;

	try {
		const args = parseArgs(argv);
		if (args.command.kind === 'help' || args.command.kind === 'version') {
			io.out(args.command.kind === 'help' ? USAGE.trimEnd() : VERSION);
			return EXIT_OK;
		}

		const settings = resolveSettings({
			env: options.env,
			homeDir: options.homeDir,
			overrides: args.overrides,
		});
		logger ??= createLogger({
			context: 'pulumi-profile',
			level: settings.logLevel,
		});

		const ctx = createCliContext(settings, logger);
		const interaction =
			options.interaction ?? createTerminalInteraction({ logger });
		return await runCommand(ctx, args, io, interaction);
	} catch (error) {
		return reportError(error, io, logger);
	}
}
