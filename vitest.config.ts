import { defineConfig } from 'vitest/config'
import path from 'node:path'
import { fileURLToPath } from 'node:url'

const root = path.dirname(fileURLToPath(import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      '@': path.resolve(root, 'frontend/src'),
    },
  },
  test: {
    environment: 'node',
    include: ['backend/api/src/**/__tests__/**/*.test.ts', 'frontend/src/**/__tests__/**/*.test.ts'],
    restoreMocks: true,
  },
})
