import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		include: ['tests/**/*_test.ts'],
		environment: 'node',
		testTimeout: 15000,
		hookTimeout: 15000
	}
})
