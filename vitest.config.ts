import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

export default defineConfig({
  resolve: {
    alias: {
      // workspace packages export their compiled output; tests run the sources
      '@tallyroll/logging': fileURLToPath(new URL('./packages/logging/src/index.ts', import.meta.url)),
    },
  },
  test: {
    globals: false,
    include: ['packages/*/test/**/*.test.ts', 'services/*/test/**/*.test.ts'],
    env: {
      PRETTY_LOGS: 'false',
      LOG_LEVEL: 'silent',
    },
  },
})
