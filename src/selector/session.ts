// ---------------------------------------------------------------------------
// Selector session: the state machine behind the interactive chooser
// ---------------------------------------------------------------------------
//
//   browsing ──enter──────────▶ selected(name)
//            ──esc / ctrl+c──▶ cancelled
//            ──q (empty query)▶ cancelled
//            ──ctrl+n────────▶ add-requested
//            ──ctrl+e────────▶ edit-requested(name)
//            ──ctrl+d────────▶ delete-requested(name)
//            ──anything else─▶ browsing
//
// Every state other than `browsing` is terminal: later keys are ignored.
// ---------------------------------------------------------------------------

import { type RankedItem, rankByName } from '../matching/fuzzy-matcher.js';
import type { ProfileRecord } from '../profiles/types.js';

export const DEFAULT_PAGE_SIZE = 10;

export type SelectorOutcome =
	| { readonly kind: 'selected'; readonly name: string }
	| { readonly kind: 'cancelled' }
	| { readonly kind: 'add-requested' }
	| { readonly kind: 'edit-requested'; readonly name: string }
	| { readonly kind: 'delete-requested'; readonly name: string };

export type SelectorStatus = { readonly kind: 'browsing' } | SelectorOutcome;

export type SelectorKey =
	| { readonly type: 'text'; readonly text: string }
	| { readonly type: 'backspace' }
	| { readonly type: 'up' }
	| { readonly type: 'down' }
	| { readonly type: 'confirm' }
	| { readonly type: 'cancel' }
	| { readonly type: 'add' }
	| { readonly type: 'edit' }
	| { readonly type: 'delete' };

export type RankedRecord = RankedItem<ProfileRecord>;

export interface SelectorSession {
	readonly records: readonly ProfileRecord[];
	readonly query: string;
	/** Index into `filtered`; 0 when `filtered` is empty. */
	readonly cursor: number;
	/** First row of `filtered` shown in the window. */
	readonly offset: number;
	readonly pageSize: number;
	readonly filtered: readonly RankedRecord[];
	readonly status: SelectorStatus;
}

export interface SelectorSessionOptions {
	readonly pageSize?: number;
	/** Start with the cursor on this profile when it is listed. */
	readonly initialName?: string;
}

const BROWSING: SelectorStatus = Object.freeze({ kind: 'browsing' });

const clampCursor = (cursor: number, length: number): number =>
	length === 0 ? 0 : Math.min(Math.max(cursor, 0), length - 1);

/** Move the window just enough to keep the cursor row visible. */
const scrollTo = (
	cursor: number,
	offset: number,
	pageSize: number,
	length: number,
): number => {
	let next = offset;
	if (cursor < next) next = cursor;
	if (cursor >= next + pageSize) next = cursor - pageSize + 1;
	return Math.min(Math.max(next, 0), Math.max(length - pageSize, 0));
};

const withCursor = (
	session: SelectorSession,
	filtered: readonly RankedRecord[],
	cursor: number,
	query = session.query,
): SelectorSession => {
	const clamped = clampCursor(cursor, filtered.length);
	return Object.freeze({
		...session,
		query,
		filtered,
		cursor: clamped,
		offset: scrollTo(clamped, session.offset, session.pageSize, filtered.length),
	});
};

const refilter = (session: SelectorSession, query: string): SelectorSession =>
	withCursor(
		session,
		rankByName(query, session.records),
		session.cursor,
		query,
	);

const finish = (
	session: SelectorSession,
	status: SelectorOutcome,
): SelectorSession => Object.freeze({ ...session, status });

// Drop control characters that slip through as "text" (e.g. pasted tabs).
const printable = (text: string): string =>
	Array.from(text)
		.filter((ch) => {
			const code = ch.codePointAt(0) ?? 0;
			return code >= 0x20 && code !== 0x7f;
		})
		.join('');

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function createSelectorSession(
	records: readonly ProfileRecord[],
	options: SelectorSessionOptions = {},
): SelectorSession {
	const pageSize = Math.max(1, options.pageSize ?? DEFAULT_PAGE_SIZE);
	const filtered = rankByName('', records);
	const initial = filtered.findIndex(
		(entry) => entry.item.name === options.initialName,
	);

	return withCursor(
		{
			records,
			query: '',
			cursor: 0,
			offset: 0,
			pageSize,
			filtered,
			status: BROWSING,
		},
		filtered,
		Math.max(initial, 0),
	);
}

/** The record under the cursor, if any. */
export function highlightedRecord(
	session: SelectorSession,
): ProfileRecord | undefined {
	return session.filtered[session.cursor]?.item;
}

/** Rows inside the visible window. */
export function visibleRows(session: SelectorSession): readonly RankedRecord[] {
	return session.filtered.slice(
		session.offset,
		session.offset + session.pageSize,
	);
}

/**
 * Apply one keystroke. Pure: returns a new session and never mutates the
 * one passed in.
 */
export function applySelectorKey(
	session: SelectorSession,
	key: SelectorKey,
): SelectorSession {
	if (session.status.kind !== 'browsing') return session;

	const highlighted = highlightedRecord(session);

	switch (key.type) {
		case 'text': {
			if (key.text === 'q' && session.query.length === 0) {
				return finish(session, { kind: 'cancelled' });
			}
			const text = printable(key.text);
			return text.length > 0 ? refilter(session, session.query + text) : session;
		}
		case 'backspace': {
			if (session.query.length === 0) return session;
			const chars = Array.from(session.query);
			return refilter(session, chars.slice(0, -1).join(''));
		}
		case 'up':
			return withCursor(session, session.filtered, session.cursor - 1);
		case 'down':
			return withCursor(session, session.filtered, session.cursor + 1);
		case 'confirm':
			return highlighted
				? finish(session, { kind: 'selected', name: highlighted.name })
				: session;
		case 'cancel':
			return finish(session, { kind: 'cancelled' });
		case 'add':
			return finish(session, { kind: 'add-requested' });
		case 'edit':
			return highlighted
				? finish(session, { kind: 'edit-requested', name: highlighted.name })
				: session;
		case 'delete':
			return highlighted
				? finish(session, { kind: 'delete-requested', name: highlighted.name })
				: session;
	}
}

/** The terminal outcome, or undefined while still browsing. */
export function sessionOutcome(
	session: SelectorSession,
): SelectorOutcome | undefined {
	return session.status.kind === 'browsing' ? undefined : session.status;
}
