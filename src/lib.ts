// ---------------------------------------------------------------------------
// pulumi-profile — public library API
//
// Record store, current selection, fuzzy matching and the selector state
// machine, for callers that want the behaviour without the CLI.
// ---------------------------------------------------------------------------

// ---- Config ---------------------------------------------------------------
export type {
	ResolveSettingsOptions,
	Settings,
	SettingsFile,
	SettingsOverrides,
} from './config/settings.js';
export {
	DEFAULT_VARIABLE,
	resolveSettings,
	validateSettingsFile,
} from './config/settings.js';
// ---- Errors ---------------------------------------------------------------
export * from './errors/index.js';
// ---- Logging --------------------------------------------------------------
export type {
	LogEntry,
	Logger,
	LoggerOptions,
	LogLevel,
	LogTransport,
	MemoryTransportHandle,
} from './logger.js';
export {
	createLogger,
	createMemoryTransport,
	createNoopLogger,
	createStderrTransport,
} from './logger.js';
// ---- Matching -------------------------------------------------------------
export type { FuzzyMatch, RankedItem } from './matching/fuzzy-matcher.js';
export { fuzzyMatch, rankByName } from './matching/fuzzy-matcher.js';
// ---- Profiles -------------------------------------------------------------
export type { RecordStoreOptions } from './profiles/record-store.js';
export { createRecordStore } from './profiles/record-store.js';
export { parseStoreContent } from './profiles/schema.js';
export type { ProfileRecord, RecordStore } from './profiles/types.js';
// ---- Selection ------------------------------------------------------------
export type {
	ActiveProfile,
	CurrentSelection,
	CurrentSelectionOptions,
	SelectionResult,
} from './selection/current-selection.js';
export { createCurrentSelection } from './selection/current-selection.js';
export type { ShellCommand, ShellKind } from './selection/shell-command.js';
export { detectShell, formatShellCommand } from './selection/shell-command.js';
// ---- Selector -------------------------------------------------------------
export type {
	RankedRecord,
	SelectorKey,
	SelectorOutcome,
	SelectorSession,
	SelectorSessionOptions,
} from './selector/session.js';
export {
	applySelectorKey,
	createSelectorSession,
	highlightedRecord,
	sessionOutcome,
	visibleRows,
} from './selector/session.js';
