import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		globals: true,
		environment: 'node',
		include: ['src/**/*.test.ts'],
		setupFiles: ['src/__tests__/setup.ts'],
		env: {
			NODE_ENV: 'test',
			JWT_SECRET: 'test-secret',
			BCRYPT_ROUNDS: '4',
			API_PAGE_SIZE: '10',
		},
	},
})
