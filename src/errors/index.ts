// ---------------------------------------------------------------------------
// Error barrel — re-exports all error factories, type guards, and utilities
// ---------------------------------------------------------------------------

export {
	type AppError,
	type AppErrorOptions,
	createAppError,
	isAppError,
	toError,
	wrapError,
} from './base.js';
export {
	type ConfigValidationError,
	createConfigParseError,
	createConfigValidationError,
	createUsageError,
	isConfigError,
	isConfigParseError,
	isConfigValidationError,
	isUsageError,
	type ValidationIssue,
} from './config.js';
export {
	createDuplicateNameError,
	createInvalidProfileError,
	createMalformedStoreError,
	createNotFoundError,
	createStoreIOError,
	type InvalidProfileError,
	isDuplicateNameError,
	isInvalidProfileError,
	isMalformedStoreError,
	isNotFoundError,
	isProfileError,
	isStoreError,
	isStoreIOError,
	type MalformedStoreError,
} from './store.js';
export {
	createTerminalInterruptedError,
	createTerminalIOError,
	isTerminalError,
	isTerminalInterruptedError,
	isTerminalIOError,
} from './terminal.js';
