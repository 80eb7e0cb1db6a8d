import { defineConfig } from 'vitest/config'
import { fileURLToPath } from 'node:url'
import { dirname } from 'node:path'

const rootDir = dirname(fileURLToPath(import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      '@': rootDir,
    },
  },
  test: {
    environment: 'node',
    include: ['__tests__/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      PURGE_MUTATION_DELAY_MS: '0',
    },
  },
})
