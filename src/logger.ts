// ---------------------------------------------------------------------------
// Structured Logger — Functional API
// ---------------------------------------------------------------------------
//
// Logger "instances" are frozen records of functions that close over a
// shared state object.  Nothing here writes to stdout: stdout carries the
// shell command printed in current-shell mode.
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'none';

export const LOG_LEVELS: readonly LogLevel[] = Object.freeze([
	'debug',
	'info',
	'warn',
	'error',
	'none',
]);

const LOG_LEVEL_PRIORITY: Readonly<Record<LogLevel, number>> = Object.freeze({
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
	none: 4,
});

export const isLogLevel = (value: unknown): value is LogLevel =>
	typeof value === 'string' && LOG_LEVELS.some((level) => level === value);

// ---------------------------------------------------------------------------
// Log Entry
// ---------------------------------------------------------------------------

export interface LogEntry {
	readonly level: LogLevel;
	readonly message: string;
	readonly timestamp: string;
	readonly context?: string;
	readonly metadata?: Readonly<Record<string, unknown>>;
}

// ---------------------------------------------------------------------------
// Transport interface
// ---------------------------------------------------------------------------

export interface LogTransport {
	readonly write: (entry: LogEntry) => void;
}

// ---------------------------------------------------------------------------
// Built-in Transports
// ---------------------------------------------------------------------------

const COLOURS: Readonly<Record<LogLevel | 'reset', string>> = Object.freeze({
	debug: '\x1b[90m',
	info: '\x1b[36m',
	warn: '\x1b[33m',
	error: '\x1b[31m',
	none: '',
	reset: '\x1b[0m',
});

export interface StderrTransportOptions {
	/** Destination stream. Defaults to `process.stderr`. */
	readonly stream?: NodeJS.WritableStream;
	/** Colourise the level tag. Defaults to whether the stream is a TTY. */
	readonly colour?: boolean;
}

/**
 * Format a log entry as a single line.
 */
export const formatLogEntry = (entry: LogEntry, colour: boolean): string => {
	const tag = entry.level.toUpperCase().padEnd(5);
	const level = colour ? `${COLOURS[entry.level]}${tag}${COLOURS.reset}` : tag;
	const prefix = entry.context ? ` [${entry.context}]` : '';
	const hasMetadata =
		entry.metadata !== undefined && Object.keys(entry.metadata).length > 0;
	const meta = hasMetadata ? ` ${JSON.stringify(entry.metadata)}` : '';
	return `${level} ${entry.timestamp}${prefix} ${entry.message}${meta}`;
};

/**
 * Create a transport that writes one formatted line per entry to stderr.
 */
export const createStderrTransport = (
	options: StderrTransportOptions = {},
): LogTransport => {
	const stream = options.stream ?? process.stderr;
	const colour = options.colour ?? process.stderr.isTTY === true;

	return Object.freeze({
		write(entry: LogEntry): void {
			stream.write(`${formatLogEntry(entry, colour)}\n`);
		},
	});
};

/**
 * A transport backed by a mutable array for tests.
 */
export interface MemoryTransportHandle extends LogTransport {
	readonly entries: LogEntry[];
	readonly clear: () => void;
	readonly filter: (level: LogLevel) => readonly LogEntry[];
}

export const createMemoryTransport = (): MemoryTransportHandle => {
	const entries: LogEntry[] = [];

	return {
		entries,
		write(entry: LogEntry): void {
			entries.push(entry);
		},
		clear(): void {
			entries.length = 0;
		},
		filter(level: LogLevel): readonly LogEntry[] {
			return entries.filter((e) => e.level === level);
		},
	};
};

// ---------------------------------------------------------------------------
// Logger interface: a record of functions
// ---------------------------------------------------------------------------

export interface Logger {
	readonly debug: (
		message: string,
		metadata?: Readonly<Record<string, unknown>>,
	) => void;
	readonly info: (
		message: string,
		metadata?: Readonly<Record<string, unknown>>,
	) => void;
	readonly warn: (
		message: string,
		metadata?: Readonly<Record<string, unknown>>,
	) => void;
	readonly error: (
		message: string,
		errorOrMetadata?: Error | Readonly<Record<string, unknown>>,
	) => void;
	readonly child: (childContext: string) => Logger;
	readonly setLevel: (level: LogLevel) => void;
	readonly getLevel: () => LogLevel;
	readonly addTransport: (transport: LogTransport) => void;
	readonly clearTransports: () => void;
}

export interface LoggerOptions {
	readonly context?: string;
	readonly level?: LogLevel;
	readonly transports?: readonly LogTransport[];
}

const resolveErrorMetadata = (
	errorOrMetadata: Error | Readonly<Record<string, unknown>> | undefined,
): Readonly<Record<string, unknown>> | undefined => {
	if (errorOrMetadata === undefined) return undefined;
	if (!(errorOrMetadata instanceof Error)) return errorOrMetadata;

	const { cause } = errorOrMetadata;
	return {
		errorName: errorOrMetadata.name,
		errorMessage: errorOrMetadata.message,
		stack: errorOrMetadata.stack,
		...(cause != null
			? { cause: cause instanceof Error ? cause.message : String(cause) }
			: {}),
	};
};

/**
 * Shared mutable state so that parent and child loggers share the same
 * level and transport list by reference.
 */
interface LoggerState {
	level: LogLevel;
	readonly transports: LogTransport[];
}

const buildLogger = (
	context: string | undefined,
	state: LoggerState,
): Logger => {
	const log = (
		level: LogLevel,
		message: string,
		metadata?: Readonly<Record<string, unknown>>,
	): void => {
		if (level === 'none') return;
		if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[state.level]) return;

		const entry: LogEntry = Object.freeze({
			level,
			message,
			timestamp: new Date().toISOString(),
			context,
			metadata,
		});

		for (const transport of state.transports) {
			transport.write(entry);
		}
	};

	return Object.freeze({
		debug: (message, metadata?) => log('debug', message, metadata),
		info: (message, metadata?) => log('info', message, metadata),
		warn: (message, metadata?) => log('warn', message, metadata),
		error: (message, errorOrMetadata?) =>
			log('error', message, resolveErrorMetadata(errorOrMetadata)),

		child: (childContext: string): Logger =>
			buildLogger(context ? `${context}:${childContext}` : childContext, state),

		setLevel: (level: LogLevel): void => {
			state.level = level;
		},
		getLevel: (): LogLevel => state.level,

		addTransport: (transport: LogTransport): void => {
			state.transports.push(transport);
		},
		clearTransports: (): void => {
			state.transports.length = 0;
		},
	} satisfies Logger);
};

/**
 * Create a logger. Without explicit transports it writes to stderr.
 */
export const createLogger = (options: LoggerOptions = {}): Logger =>
	buildLogger(options.context, {
		level: options.level ?? 'warn',
		transports: options.transports
			? [...options.transports]
			: [createStderrTransport()],
	});

/**
 * A logger that drops everything. Used as the default collaborator so that
 * library callers do not have to pass one.
 */
export const createNoopLogger = (): Logger =>
	createLogger({ level: 'none', transports: [] });
