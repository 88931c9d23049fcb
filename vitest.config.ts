import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    pool: 'forks',
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
  },
})
