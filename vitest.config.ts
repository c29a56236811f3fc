import { defineConfig } from 'vitest/config';

export default defineConfig({
	esbuild: {
		jsx: 'automatic',
	},
	test: {
		include: ['tests/**/*.test.ts', 'cli/tests/**/*.test.{ts,tsx}'],
		environment: 'node',
	},
});
