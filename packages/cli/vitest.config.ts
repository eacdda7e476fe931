import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['src/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@gitvista/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
    },
  },
})
