import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        'node_modules/**',
        'dist/**',
        '**/*.d.ts',
        'vitest.config.ts',
        'src/index.ts',         // Re-exports only
        'src/domain/index.ts'   // Re-exports only
      ],
      thresholds: {
        statements: 84,
        branches: 77,
        functions: 88,
        lines: 85
      }
    },
    testTimeout: 30000
  }
})
