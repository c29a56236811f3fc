// ---------------------------------------------------------------------------
// Terminal Errors
// ---------------------------------------------------------------------------

import { constants } from 'node:os';
import type { AppError } from './base.js';
import { createAppError, isAppError } from './base.js';

export const createTerminalIOError = (
	message: string,
	options: { cause?: unknown } = {},
): AppError =>
	createAppError(message, {
		name: 'TerminalIOError',
		code: 'TERMINAL_IO',
		cause: options.cause,
	});

/**
 * The interactive run was torn down by a signal. The exit code follows the
 * shell convention of 128 + signal number.
 */
export const createTerminalInterruptedError = (
	signal: NodeJS.Signals,
): AppError =>
	createAppError(`Interrupted by ${signal}`, {
		name: 'TerminalInterruptedError',
		code: 'TERMINAL_INTERRUPTED',
		exitCode: 128 + (constants.signals[signal] ?? 0),
		metadata: { signal },
	});

// ---------------------------------------------------------------------------
// Type Guards
// ---------------------------------------------------------------------------

export const isTerminalError = (value: unknown): value is AppError =>
	isAppError(value) && value.code.startsWith('TERMINAL_');

export const isTerminalIOError = (value: unknown): value is AppError =>
	isAppError(value) && value.code === 'TERMINAL_IO';

export const isTerminalInterruptedError = (value: unknown): value is AppError =>
	isAppError(value) && value.code === 'TERMINAL_INTERRUPTED';
