import { cleanup, render } from 'ink-testing-library';
import { afterEach, describe, expect, test } from 'vitest';
import { TextPrompt } from '../components/text-prompt.js';

const tick = () => new Promise((r) => setTimeout(r, 50));

// biome-ignore lint/suspicious/noControlCharactersInRegex: matching ANSI escapes
const stripAnsi = (text: string): string => text.replace(/\x1b\[[0-9;]*m/g, '');

async function renderPrompt(
	props: {
		initialValue?: string;
		help?: string;
		validate?: (value: string) => string | undefined;
	} = {},
) {
	const submitted: string[] = [];
	let cancelled = 0;
	const instance = render(
		<TextPrompt
			message="Profile name:"
			onSubmit={(value) => submitted.push(value)}
			onCancel={() => {
				cancelled++;
			}}
			{...props}
		/>,
	);
	await tick();

	const press = async (...keys: string[]) => {
		for (const key of keys) instance.stdin.write(key);
		await tick();
	};
	const frame = () => stripAnsi(instance.lastFrame() ?? '');
	return { submitted, cancelled: () => cancelled, press, frame };
}

describe('TextPrompt', () => {
	afterEach(cleanup);

	test('renders the message and help line', async () => {
		const { frame } = await renderPrompt({ help: 'e.g., s3://my-bucket/state' });
		expect(frame()).toContain('? Profile name:');
		expect(frame()).toContain('  e.g., s3://my-bucket/state');
	});

	test('submits the trimmed value on enter', async () => {
		const { press, submitted, frame } = await renderPrompt();
		await press(' ', 'd', 'e', 'v', ' ');
		expect(frame()).toContain('dev');

		await press('\r');
		expect(submitted).toEqual(['dev']);
		expect(frame()).toBe('');
	});

	test('keeps the prompt open while validation fails', async () => {
		const { press, submitted, frame } = await renderPrompt({
			validate: (value) =>
				value.length === 0 ? 'Profile name cannot be empty' : undefined,
		});
		await press('\r');
		expect(submitted).toEqual([]);
		expect(frame()).toContain('✗ Profile name cannot be empty');

		await press('x');
		expect(frame()).not.toContain('✗');

		await press('\r');
		expect(submitted).toEqual(['x']);
	});

	test('edits an initial value', async () => {
		const { press, submitted } = await renderPrompt({ initialValue: 's3://a' });
		await press('\x7f', 'b', '\r');
		expect(submitted).toEqual(['s3://b']);
	});

	test('moves the cursor with arrows and ctrl+a', async () => {
		const { press, submitted } = await renderPrompt();
		await press('b', 'c', '\x01', 'a', '\x1b[C', '\x1b[C', '\x1b[D', 'x', '\r');
		expect(submitted).toEqual(['abxc']);
	});

	test('jumps to the end with ctrl+e right after ctrl+a', async () => {
		const { press, submitted } = await renderPrompt();
		await press('a', 'b', '\x01', '\x05', 'c', '\r');
		expect(submitted).toEqual(['abc']);
	});

	test('cancels on escape', async () => {
		const { press, submitted, cancelled, frame } = await renderPrompt();
		await press('d', '\x1b');
		expect(cancelled()).toBe(1);
		expect(submitted).toEqual([]);
		expect(frame()).toBe('');
	});
});
