import { Box, Text, useInput } from 'ink';
import { useState } from 'react';
import { TextInput } from './text-input.js';

export interface TextPromptProps {
	readonly message: string;
	readonly help?: string;
	readonly initialValue?: string;
	/** Return an error message to keep the prompt open. */
	readonly validate?: (value: string) => string | undefined;
	readonly onSubmit: (value: string) => void;
	readonly onCancel: () => void;
}

export function TextPrompt({
	message,
	help,
	initialValue = '',
	validate,
	onSubmit,
	onCancel,
}: TextPromptProps) {
	const [value, setValue] = useState(initialValue);
	const [error, setError] = useState<string | undefined>();
	const [done, setDone] = useState(false);

	useInput(
		(input, key) => {
			if (key.escape || (key.ctrl && input === 'c')) {
				setDone(true);
				onCancel();
			}
		},
		{ isActive: !done },
	);

	if (done) return null;

	return (
		<Box flexDirection="column">
			<Box>
				<Text color="green">{'? '}</Text>
				<Text bold>{`${message} `}</Text>
				<TextInput
					value={value}
					isActive={!done}
					onChange={(next) => {
						setValue(next);
						setError(undefined);
					}}
					onSubmit={(submitted) => {
						const trimmed = submitted.trim();
						const problem = validate?.(trimmed);
						if (problem) {
							setError(problem);
							return;
						}
						setDone(true);
						onSubmit(trimmed);
					}}
				/>
			</Box>
			{error ? (
				<Text color="red">{`  ✗ ${error}`}</Text>
			) : help ? (
				<Text dimColor>{`  ${help}`}</Text>
			) : null}
		</Box>
	);
}
