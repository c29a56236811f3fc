import chalk from 'chalk';
import { Text, useInput } from 'ink';
import { useCallback, useEffect, useRef, useState } from 'react';

interface TextInputProps {
	readonly value: string;
	readonly onChange: (value: string) => void;
	readonly onSubmit?: (value: string) => void;
	readonly isActive?: boolean;
}

/**
 * Single-line text input with a block cursor. Ctrl+A / Ctrl+E jump to the
 * start / end of the line.
 */
export function TextInput({
	value,
	onChange,
	onSubmit,
	isActive = true,
}: TextInputProps) {
	const [cursorOffset, setCursorOffset] = useState(value.length);

	// Refs for stable callback access, synced from props during render
	// AND eagerly updated inside the handler to avoid stale reads between renders
	const valueRef = useRef(value);
	const cursorRef = useRef(cursorOffset);
	const onChangeRef = useRef(onChange);
	const onSubmitRef = useRef(onSubmit);
	// Last value this input reported through onChange
	const emittedRef = useRef(value);

	valueRef.current = value;
	cursorRef.current = cursorOffset;
	onChangeRef.current = onChange;
	onSubmitRef.current = onSubmit;

	const moveTo = (offset: number): void => {
		cursorRef.current = offset;
		setCursorOffset(offset);
	};

	// Move cursor to end only when the value was replaced from outside.
	useEffect(() => {
		if (value === emittedRef.current) return;
		emittedRef.current = value;
		cursorRef.current = value.length;
		setCursorOffset(value.length);
	}, [value]);

	const commit = (next: string, cursor: number): void => {
		valueRef.current = next;
		emittedRef.current = next;
		moveTo(cursor);
		onChangeRef.current(next);
	};

	const handleInput = useCallback(
		(
			input: string,
			key: {
				upArrow: boolean;
				downArrow: boolean;
				leftArrow: boolean;
				rightArrow: boolean;
				return: boolean;
				backspace: boolean;
				delete: boolean;
				ctrl: boolean;
				tab: boolean;
				escape: boolean;
			},
		) => {
			if (key.upArrow || key.downArrow || key.tab || key.escape) return;

			const v = valueRef.current;
			const c = cursorRef.current;

			if (key.ctrl) {
				if (input === 'a') moveTo(0);
				if (input === 'e') moveTo(v.length);
				return;
			}

			if (key.return) {
				onSubmitRef.current?.(v);
				return;
			}

			// Most terminals send DEL for backspace, which Ink reports as `delete`.
			if (key.backspace || key.delete) {
				if (c > 0) commit(v.slice(0, c - 1) + v.slice(c), c - 1);
				return;
			}

			if (key.leftArrow) {
				moveTo(Math.max(0, c - 1));
				return;
			}

			if (key.rightArrow) {
				moveTo(Math.min(v.length, c + 1));
				return;
			}

			// Regular character input (including paste); line breaks are dropped.
			const text = input.replace(/[\r\n]/g, '');
			if (text.length === 0) return;
			commit(v.slice(0, c) + text + v.slice(c), c + text.length);
		},
		[],
	);

	useInput(handleInput, { isActive });

	if (!isActive) {
		return <Text dimColor>{value}</Text>;
	}

	if (value.length === 0) {
		return <Text>{chalk.inverse(' ')}</Text>;
	}

	let rendered = '';
	for (let i = 0; i < value.length; i++) {
		const ch = value[i] ?? '';
		rendered += i === cursorOffset ? chalk.inverse(ch) : ch;
	}
	if (cursorOffset === value.length) {
		rendered += chalk.inverse(' ');
	}
	return <Text>{rendered}</Text>;
}
