import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/index.ts', 'src/cli/bin.ts'],
      thresholds: {
        statements: 75,
        branches: 60,
        functions: 60,
        lines: 75,
      },
    },
    testTimeout: 30000,
  },
})
