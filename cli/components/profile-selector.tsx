import { Box, type Key, Text, useInput } from 'ink';
import { useEffect, useReducer, useRef } from 'react';
import type { ProfileRecord } from '../../src/profiles/types.js';
import {
	applySelectorKey,
	createSelectorSession,
	type RankedRecord,
	type SelectorKey,
	type SelectorOutcome,
	sessionOutcome,
	visibleRows,
} from '../../src/selector/session.js';

export const SELECTOR_HELP =
	'↑↓ move  ↵ select  type to filter  esc cancel  ^n add  ^e edit  ^d delete';

interface ProfileSelectorProps {
	readonly records: readonly ProfileRecord[];
	readonly onDone: (outcome: SelectorOutcome) => void;
	readonly pageSize?: number;
	/** Profile to highlight first, usually the active one. */
	readonly initialName?: string;
}

/**
 * Translate an Ink keypress into a selector key. Returns undefined for keys
 * the selector ignores.
 */
export function toSelectorKey(input: string, key: Key): SelectorKey | undefined {
	if (key.escape) return { type: 'cancel' };
	if (key.ctrl) {
		switch (input) {
			case 'c':
				return { type: 'cancel' };
			case 'n':
				return { type: 'add' };
			case 'e':
				return { type: 'edit' };
			case 'd':
				return { type: 'delete' };
			default:
				return undefined;
		}
	}
	if (key.upArrow) return { type: 'up' };
	if (key.downArrow) return { type: 'down' };
	if (key.return) return { type: 'confirm' };
	if (key.backspace || key.delete) return { type: 'backspace' };
	if (key.meta || key.tab || key.leftArrow || key.rightArrow) return undefined;
	if (key.pageUp || key.pageDown) return undefined;
	return input.length > 0 ? { type: 'text', text: input } : undefined;
}

/** Split a name into plain and matched runs for highlighting. */
function nameSegments(
	name: string,
	positions: readonly number[],
): Array<{ readonly text: string; readonly matched: boolean }> {
	const matched = new Set(positions);
	const segments: Array<{ text: string; matched: boolean }> = [];
	Array.from(name).forEach((ch, i) => {
		const isMatch = matched.has(i);
		const last = segments[segments.length - 1];
		if (last && last.matched === isMatch) {
			last.text += ch;
		} else {
			segments.push({ text: ch, matched: isMatch });
		}
	});
	return segments;
}

function SelectorRow({
	entry,
	isSelected,
	nameWidth,
}: {
	readonly entry: RankedRecord;
	readonly isSelected: boolean;
	readonly nameWidth: number;
}) {
	const { name, backend } = entry.item;
	const padding = ' '.repeat(Math.max(nameWidth - Array.from(name).length, 0));
	const colour = isSelected ? 'cyan' : undefined;

	return (
		<Box>
			<Text color={colour}>{isSelected ? '  ❯ ' : '    '}</Text>
			<Text bold={isSelected} color={colour}>
				{nameSegments(name, entry.positions).map((segment, i) => (
					// biome-ignore lint/suspicious/noArrayIndexKey: segments derive from the name, order is stable
					<Text key={i} underline={segment.matched}>
						{segment.text}
					</Text>
				))}
			</Text>
			<Text>{`${padding}  `}</Text>
			<Text dimColor>{backend}</Text>
		</Box>
	);
}

export function ProfileSelector({
	records,
	onDone,
	pageSize,
	initialName,
}: ProfileSelectorProps) {
	const [session, dispatch] = useReducer(applySelectorKey, undefined, () =>
		createSelectorSession(records, { pageSize, initialName }),
	);
	const doneRef = useRef(false);
	const outcome = sessionOutcome(session);

	useEffect(() => {
		if (!outcome || doneRef.current) return;
		doneRef.current = true;
		onDone(outcome);
	}, [outcome, onDone]);

	useInput(
		(input, key) => {
			const selectorKey = toSelectorKey(input, key);
			if (selectorKey) dispatch(selectorKey);
		},
		{ isActive: outcome === undefined },
	);

	// Leave nothing behind in the region once a decision is made.
	if (outcome) return null;

	const rows = visibleRows(session);
	const nameWidth = rows.reduce(
		(width, entry) => Math.max(width, Array.from(entry.item.name).length),
		0,
	);
	const above = session.offset;
	const below = session.filtered.length - session.offset - rows.length;

	return (
		<Box flexDirection="column">
			<Text bold>Select Pulumi Profile:</Text>
			<Box>
				<Text color="cyan">{'❯ '}</Text>
				<Text>{session.query}</Text>
				<Text inverse> </Text>
			</Box>
			{records.length === 0 && (
				<Text dimColor>{'    No profiles yet. Press ctrl+n to add one.'}</Text>
			)}
			{records.length > 0 && rows.length === 0 && (
				<Text dimColor>{`    No profiles match "${session.query}"`}</Text>
			)}
			{above > 0 && <Text dimColor>{`    ↑ ${above} more`}</Text>}
			{rows.map((entry, i) => (
				<SelectorRow
					key={entry.item.name}
					entry={entry}
					isSelected={session.offset + i === session.cursor}
					nameWidth={nameWidth}
				/>
			))}
			{below > 0 && <Text dimColor>{`    ↓ ${below} more`}</Text>}
			<Text dimColor>{`  ${SELECTOR_HELP}`}</Text>
		</Box>
	);
}
