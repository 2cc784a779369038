import {defineConfig} from 'vitest/config';

export default defineConfig({
	test: {
		include: ['source/**/*.test.ts'],
		exclude: ['**/node_modules/**', '**/dist/**'],
		environment: 'node',
		setupFiles: ['source/test-setup.ts'],
		// LanceDB's native module and the WASM parser run in forked workers
		pool: 'forks',
		testTimeout: 60_000,
		hookTimeout: 60_000,
	},
});
