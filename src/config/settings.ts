/**
 * pulumi-profile — Settings
 *
 * Resolves where the files live and how the tool behaves from:
 *
 *   defaults             ~/.pulumi, PULUMI_BACKEND_URL, 10 rows, warn
 *   settings file        <dataDir>/profile-selector.json (optional)
 *   environment          PULUMI_PROFILE_HOME, PULUMI_PROFILE_PAGE_SIZE,
 *                        PULUMI_PROFILE_LOG_LEVEL, SHELL
 *   overrides            CLI flags (--data-dir, --shell)
 *
 * Precedence: overrides > environment > settings file > defaults.
 */

import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import {
	createConfigParseError,
	createConfigValidationError,
	type ValidationIssue,
} from '../errors/index.js';
import { isLogLevel, type LogLevel } from '../logger.js';
import { readTextFile } from '../profiles/file-io.js';
import { DEFAULT_PAGE_SIZE } from '../selector/session.js';
import {
	detectShell,
	isShellKind,
	type ShellKind,
} from '../selection/shell-command.js';

export const SETTINGS_FILENAME = 'profile-selector.json';
export const STORE_FILENAME = 'profiles.json';
export const POINTER_FILENAME = 'current_profile';
export const DEFAULT_VARIABLE = 'PULUMI_BACKEND_URL';
export const MAX_PAGE_SIZE = 50;

export interface Settings {
	readonly dataDir: string;
	readonly storePath: string;
	readonly pointerPath: string;
	/** Environment variable that receives the backend URL. */
	readonly variable: string;
	/** Rows shown by the interactive selector. */
	readonly pageSize: number;
	readonly logLevel: LogLevel;
	readonly shell: ShellKind;
}

export interface SettingsOverrides {
	readonly dataDir?: string;
	readonly shell?: ShellKind;
}

export interface ResolveSettingsOptions {
	readonly env?: NodeJS.ProcessEnv;
	readonly homeDir?: string;
	readonly overrides?: SettingsOverrides;
}

/** Shape of the optional settings file. Every key is optional. */
export interface SettingsFile {
	readonly variable?: string;
	readonly pageSize?: number;
	readonly logLevel?: LogLevel;
	readonly shell?: ShellKind;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

const VARIABLE_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === 'object' && value !== null && !Array.isArray(value);

const checkPageSize = (value: unknown, path: string): ValidationIssue[] =>
	typeof value === 'number' &&
	Number.isInteger(value) &&
	value >= 1 &&
	value <= MAX_PAGE_SIZE
		? []
		: [{ path, message: `${path} must be an integer from 1 to ${MAX_PAGE_SIZE}` }];

const checkLogLevel = (value: unknown, path: string): ValidationIssue[] =>
	isLogLevel(value)
		? []
		: [{ path, message: `${path} must be one of debug, info, warn, error, none` }];

const checkShell = (value: unknown, path: string): ValidationIssue[] =>
	isShellKind(value)
		? []
		: [{ path, message: `${path} must be one of posix, fish, nu` }];

const checkVariable = (value: unknown, path: string): ValidationIssue[] =>
	typeof value === 'string' && VARIABLE_PATTERN.test(value)
		? []
		: [{ path, message: `${path} must be a valid environment variable name` }];

/**
 * Validate the parsed settings file. Unknown keys are reported too, since
 * they are almost always typos.
 */
export function validateSettingsFile(raw: unknown): {
	readonly settings: SettingsFile;
	readonly issues: readonly ValidationIssue[];
} {
	if (!isRecord(raw)) {
		return {
			settings: {},
			issues: [{ path: '$', message: 'settings file must hold a JSON object' }],
		};
	}

	const issues: ValidationIssue[] = [];
	const { variable, pageSize, logLevel, shell, ...rest } = raw;

	if (variable !== undefined) issues.push(...checkVariable(variable, 'variable'));
	if (pageSize !== undefined) issues.push(...checkPageSize(pageSize, 'pageSize'));
	if (logLevel !== undefined) issues.push(...checkLogLevel(logLevel, 'logLevel'));
	if (shell !== undefined) issues.push(...checkShell(shell, 'shell'));
	for (const key of Object.keys(rest)) {
		issues.push({ path: key, message: `unknown setting "${key}"` });
	}

	return {
		settings: {
			variable: typeof variable === 'string' ? variable : undefined,
			pageSize: typeof pageSize === 'number' ? pageSize : undefined,
			logLevel: isLogLevel(logLevel) ? logLevel : undefined,
			shell: isShellKind(shell) ? shell : undefined,
		},
		issues,
	};
}

function loadSettingsFile(path: string): SettingsFile {
	let raw: string | undefined;
	try {
		raw = readTextFile(path);
	} catch (error) {
		throw createConfigParseError(path, { cause: error });
	}
	if (raw === undefined || raw.trim().length === 0) return {};

	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (error) {
		throw createConfigParseError(path, { cause: error });
	}

	const { settings, issues } = validateSettingsFile(parsed);
	if (issues.length > 0) {
		throw createConfigValidationError(issues, { configPath: path });
	}
	return settings;
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

const parsePageSizeEnv = (
	value: string | undefined,
	issues: ValidationIssue[],
): number | undefined => {
	if (value === undefined || value.trim() === '') return undefined;
	const parsed = Number(value);
	const found = checkPageSize(parsed, 'PULUMI_PROFILE_PAGE_SIZE');
	issues.push(...found);
	return found.length === 0 ? parsed : undefined;
};

const parseLogLevelEnv = (
	value: string | undefined,
	issues: ValidationIssue[],
): LogLevel | undefined => {
	if (value === undefined || value.trim() === '') return undefined;
	const level = value.trim().toLowerCase();
	if (isLogLevel(level)) return level;
	issues.push(...checkLogLevel(level, 'PULUMI_PROFILE_LOG_LEVEL'));
	return undefined;
};

export function resolveSettings(options: ResolveSettingsOptions = {}): Settings {
	const env = options.env ?? process.env;
	const overrides = options.overrides ?? {};
	const home = options.homeDir ?? homedir();

	const dataDir = resolve(
		overrides.dataDir ??
			(env.PULUMI_PROFILE_HOME || undefined) ??
			join(home, '.pulumi'),
	);

	const fileSettings = loadSettingsFile(join(dataDir, SETTINGS_FILENAME));

	const issues: ValidationIssue[] = [];
	const envPageSize = parsePageSizeEnv(env.PULUMI_PROFILE_PAGE_SIZE, issues);
	const envLogLevel = parseLogLevelEnv(env.PULUMI_PROFILE_LOG_LEVEL, issues);
	if (issues.length > 0) throw createConfigValidationError(issues);

	return Object.freeze({
		dataDir,
		storePath: join(dataDir, STORE_FILENAME),
		pointerPath: join(dataDir, POINTER_FILENAME),
		variable: fileSettings.variable ?? DEFAULT_VARIABLE,
		pageSize: envPageSize ?? fileSettings.pageSize ?? DEFAULT_PAGE_SIZE,
		logLevel: envLogLevel ?? fileSettings.logLevel ?? 'warn',
		shell: overrides.shell ?? fileSettings.shell ?? detectShell(env.SHELL),
	});
}
