// ---------------------------------------------------------------------------
// AppError — base interface, factory, type guard, and utilities
// ---------------------------------------------------------------------------

/**
 * The AppError interface describes the shape of every error produced by
 * pulumi-profile.  Consumers discriminate errors via the `code` field and
 * the type-guard functions exported from sibling modules.
 */
export interface AppError extends Error {
	/** Machine-readable error code (e.g. "STORE_MALFORMED", "PROFILE_NOT_FOUND"). */
	readonly code: string;
	/** Process exit code the CLI uses when this error ends the run. */
	readonly exitCode: number;
	/** Arbitrary structured context attached to the error. */
	readonly metadata: Readonly<Record<string, unknown>>;
	/** Return a plain-object representation suitable for logging / serialisation. */
	readonly toJSON: () => Record<string, unknown>;
}

export interface AppErrorOptions {
	readonly name?: string;
	readonly code?: string;
	readonly exitCode?: number;
	readonly cause?: unknown;
	readonly metadata?: Readonly<Record<string, unknown>>;
}

const describeCause = (cause: unknown): unknown =>
	cause instanceof Error ? { name: cause.name, message: cause.message } : cause;

/**
 * Create an `AppError`: a plain `Error` object augmented with structured
 * fields.
 */
export const createAppError = (
	message: string,
	options: AppErrorOptions = {},
): AppError => {
	const err = new Error(message, { cause: options.cause });
	err.name = options.name ?? 'AppError';
	const code = options.code ?? 'APP_ERROR';
	const exitCode = options.exitCode ?? 1;
	const metadata = Object.freeze({ ...options.metadata });

	return Object.assign(err, {
		code,
		exitCode,
		metadata,
		toJSON: (): Record<string, unknown> => ({
			name: err.name,
			code,
			message: err.message,
			exitCode,
			metadata,
			cause: describeCause(err.cause),
			stack: err.stack,
		}),
	});
};

/**
 * Type-guard that checks whether a value is an `AppError`.
 * Uses duck-typing on the structured fields rather than `instanceof`.
 */
export const isAppError = (value: unknown): value is AppError =>
	value instanceof Error &&
	'code' in value &&
	typeof value.code === 'string' &&
	'exitCode' in value &&
	typeof value.exitCode === 'number' &&
	'toJSON' in value &&
	typeof value.toJSON === 'function';

/**
 * Normalise an unknown thrown value into a proper `Error` instance.
 */
export const toError = (value: unknown): Error => {
	if (value instanceof Error) return value;
	if (typeof value === 'string') return new Error(value);
	return new Error(String(value));
};

/**
 * Wrap an unknown cause in an `AppError` with an optional error code.
 */
export const wrapError = (
	message: string,
	cause: unknown,
	code?: string,
): AppError => createAppError(message, { cause, code });
