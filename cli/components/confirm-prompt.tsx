import { Box, Text, useInput } from 'ink';
import { useRef, useState } from 'react';

interface ConfirmPromptProps {
	readonly message: string;
	readonly confirmLabel?: string;
	readonly cancelLabel?: string;
	readonly onAnswer: (confirmed: boolean) => void;
}

/**
 * Yes/no question that defaults to "no". Esc answers no.
 */
export function ConfirmPrompt({
	message,
	confirmLabel = 'Yes, delete it',
	cancelLabel = 'No, keep it',
	onAnswer,
}: ConfirmPromptProps) {
	const [selectedIndex, setSelectedIndex] = useState(0);
	const [done, setDone] = useState(false);

	// Keys that arrive before the next render must see the latest choice.
	const selectedRef = useRef(0);
	const doneRef = useRef(false);

	const select = (index: number): void => {
		selectedRef.current = index;
		setSelectedIndex(index);
	};

	const answer = (confirmed: boolean): void => {
		if (doneRef.current) return;
		doneRef.current = true;
		setDone(true);
		onAnswer(confirmed);
	};

	useInput(
		(input, key) => {
			if (key.escape || (key.ctrl && input === 'c')) {
				answer(false);
				return;
			}
			if (key.upArrow) {
				select(0);
				return;
			}
			if (key.downArrow) {
				select(1);
				return;
			}
			if (key.return) {
				answer(selectedRef.current === 1);
				return;
			}
			const lower = input.toLowerCase();
			if (lower === 'y') answer(true);
			if (lower === 'n') answer(false);
		},
		{ isActive: !done },
	);

	if (done) return null;

	return (
		<Box flexDirection="column">
			<Box>
				<Text color="red">{'⚠  '}</Text>
				<Text bold>{message}</Text>
			</Box>

			{/* Option 0: No (default) */}
			<Box>
				<Text color={selectedIndex === 0 ? 'cyan' : undefined}>
					{selectedIndex === 0 ? '  ❯ ' : '    '}
				</Text>
				<Text
					bold={selectedIndex === 0}
					color={selectedIndex === 0 ? 'cyan' : undefined}
				>
					{cancelLabel}
				</Text>
			</Box>

			{/* Option 1: Yes */}
			<Box>
				<Text color={selectedIndex === 1 ? 'red' : undefined}>
					{selectedIndex === 1 ? '  ❯ ' : '    '}
				</Text>
				<Text
					bold={selectedIndex === 1}
					color={selectedIndex === 1 ? 'red' : undefined}
				>
					{confirmLabel}
				</Text>
			</Box>

			<Text dimColor>{'  ↑↓ navigate  ↵ select  y/n  esc cancel'}</Text>
		</Box>
	);
}
