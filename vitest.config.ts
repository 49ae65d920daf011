import { defineConfig } from 'vitest/config'
import path from 'node:path'
import { fileURLToPath } from 'node:url'

const root = path.dirname(fileURLToPath(import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      '@engine': path.resolve(root, 'src/engine'),
      '@ai': path.resolve(root, 'src/ai'),
      '@shared': path.resolve(root, 'src/shared'),
    },
  },
  test: {
    environment: 'node',
    include: ['src/test/**/*.test.ts'],
  },
})
