// ---------------------------------------------------------------------------
// Fuzzy matching for profile names
// ---------------------------------------------------------------------------
//
// A query matches a candidate when its characters appear in the candidate
// in order, ignoring case. Matching is greedy: each query character takes
// the leftmost candidate character after the previous match.
//
// Score = matched characters
//       + 2 for each matched character adjacent to another matched one
//       + 3 when the match starts at the first character
// ---------------------------------------------------------------------------

const CONTIGUOUS_BONUS = 2;
const PREFIX_BONUS = 3;

export interface FuzzyMatch {
	readonly score: number;
	/** Code-point indices in the candidate that matched, ascending. */
	readonly positions: readonly number[];
}

const EMPTY_MATCH: FuzzyMatch = Object.freeze({
	score: 0,
	positions: Object.freeze([]),
});

const fold = (ch: string): string => ch.toLowerCase();

/**
 * Match `query` against `candidate`. Returns undefined when the query is not
 * a subsequence of the candidate.
 */
export function fuzzyMatch(
	query: string,
	candidate: string,
): FuzzyMatch | undefined {
	const needle = Array.from(query, fold);
	if (needle.length === 0) return EMPTY_MATCH;

	const haystack = Array.from(candidate, fold);
	const positions: number[] = [];
	let qi = 0;
	for (let ci = 0; ci < haystack.length && qi < needle.length; ci++) {
		if (haystack[ci] === needle[qi]) {
			positions.push(ci);
			qi++;
		}
	}
	if (qi < needle.length) return undefined;

	return Object.freeze({
		score: scorePositions(positions),
		positions: Object.freeze(positions),
	});
}

function scorePositions(positions: readonly number[]): number {
	let score = positions.length;
	positions.forEach((pos, i) => {
		const prev = positions[i - 1];
		const next = positions[i + 1];
		const joinsPrev = prev !== undefined && prev === pos - 1;
		const joinsNext = next !== undefined && next === pos + 1;
		if (joinsPrev || joinsNext) score += CONTIGUOUS_BONUS;
	});
	if (positions[0] === 0) score += PREFIX_BONUS;
	return score;
}

// ---------------------------------------------------------------------------
// Ranking
// ---------------------------------------------------------------------------

export interface RankedItem<T> {
	readonly item: T;
	readonly index: number;
	readonly score: number;
	readonly positions: readonly number[];
}

const compareText = (a: string, b: string): number =>
	a < b ? -1 : a > b ? 1 : 0;

/**
 * Keep the items whose name matches `query`, best first. Equal scores are
 * ordered by lower-cased name, then by original position.
 */
export function rankByName<T extends { readonly name: string }>(
	query: string,
	items: readonly T[],
): readonly RankedItem<T>[] {
	const ranked: Array<RankedItem<T> & { readonly key: string }> = [];

	items.forEach((item, index) => {
		const match = fuzzyMatch(query, item.name);
		if (!match) return;
		ranked.push({
			item,
			index,
			score: match.score,
			positions: match.positions,
			key: item.name.toLowerCase(),
		});
	});

	ranked.sort(
		(a, b) =>
			b.score - a.score || compareText(a.key, b.key) || a.index - b.index,
	);

	return ranked.map(({ item, index, score, positions }) => ({
		item,
		index,
		score,
		positions,
	}));
}
