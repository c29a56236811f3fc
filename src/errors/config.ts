// ---------------------------------------------------------------------------
// Configuration Errors
// ---------------------------------------------------------------------------

import type { AppError } from './base.js';
import { createAppError, isAppError } from './base.js';

export interface ValidationIssue {
	readonly path: string;
	readonly message: string;
}

export type ConfigValidationError = AppError & {
	readonly issues: readonly ValidationIssue[];
};

export const createConfigValidationError = (
	issues: readonly ValidationIssue[],
	options: { cause?: unknown; configPath?: string } = {},
): ConfigValidationError => {
	const summary =
		issues.length === 1
			? (issues[0]?.message ?? 'unknown issue')
			: `${issues.length} validation errors`;

	const frozenIssues = Object.freeze([...issues]);

	return Object.assign(
		createAppError(`Invalid configuration: ${summary}`, {
			name: 'ConfigValidationError',
			code: 'CONFIG_VALIDATION',
			cause: options.cause,
			metadata: { issues: frozenIssues, configPath: options.configPath },
		}),
		{ issues: frozenIssues },
	);
};

export const createConfigParseError = (
	configPath: string,
	options: { cause?: unknown } = {},
): AppError =>
	createAppError(`Failed to parse configuration file: ${configPath}`, {
		name: 'ConfigParseError',
		code: 'CONFIG_PARSE',
		cause: options.cause,
		metadata: { configPath },
	});

export const createUsageError = (message: string): AppError =>
	createAppError(message, {
		name: 'UsageError',
		code: 'CLI_USAGE',
	});

// ---------------------------------------------------------------------------
// Type Guards
// ---------------------------------------------------------------------------

export const isConfigError = (value: unknown): value is AppError =>
	isAppError(value) && value.code.startsWith('CONFIG_');

export const isConfigValidationError = (
	value: unknown,
): value is ConfigValidationError =>
	isAppError(value) &&
	value.code === 'CONFIG_VALIDATION' &&
	'issues' in value &&
	Array.isArray(value.issues);

export const isConfigParseError = (value: unknown): value is AppError =>
	isAppError(value) && value.code === 'CONFIG_PARSE';

export const isUsageError = (value: unknown): value is AppError =>
	isAppError(value) && value.code === 'CLI_USAGE';
