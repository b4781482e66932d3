import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const source = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
	resolve: {
		alias: {
			'@seatbook/core': source('core'),
			'@seatbook/availability': source('availability'),
			'@seatbook/client': source('client'),
		},
	},
	test: {
		include: ['packages/*/tests/**/*.test.ts'],
		environment: 'node',
	},
});
