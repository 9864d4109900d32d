import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Tests use in-process fetchers only
    setupFiles: ['src/test-no-network.setup.ts'],
    env: {
      LOG_LEVEL: 'fatal',
    },
  },
})
