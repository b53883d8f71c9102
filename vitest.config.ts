import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

export default defineConfig({
  resolve: {
    alias: {
      '@roomstate/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
      '@roomstate/server': fileURLToPath(new URL('./packages/server/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['packages/*/__tests__/**/*.test.ts'],
    environment: 'node',
  },
})
