import { defineConfig } from 'vitest/config'

/** Vitest configuration. */
export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    restoreMocks: true,
    clearMocks: true,
  },
})
