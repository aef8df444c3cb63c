import { defineConfig } from 'vitest/config';
import { resolve } from 'path';

export default defineConfig({
	test: {
		environment: 'node',
		globals: true,
		setupFiles: ['./tests/setup.ts'],
		include: ['tests/**/*.test.ts'],
		exclude: ['**/node_modules/**', '**/dist/**'],
		// Offset matching is quadratic in frame height; property runs need headroom
		testTimeout: 60000,
		hookTimeout: 30000,
		reporters: ['default']
	},
	resolve: {
		alias: {
			$lib: resolve('./src/lib')
		}
	}
});
