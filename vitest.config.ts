import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		include: ['tests/**/*.spec.ts'],
		coverage: {
			provider: 'istanbul',
			include: ['src/**/*.ts'],
			reporter: ['text', 'html', 'clover', 'json', 'lcov']
		}
	}
});
