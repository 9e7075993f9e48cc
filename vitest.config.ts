import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    watch: false,

    testTimeout: 30000,
    hookTimeout: 10000,

    // Driver tests touch real temp files; keep them in one thread
    pool: 'threads',
    poolOptions: {
      threads: {
        singleThread: true
      }
    },

    clearMocks: true,
    restoreMocks: true,

    include: ['tests/**/*.{test,spec}.ts'],
    exclude: ['node_modules', 'dist', '.git'],
    setupFiles: ['tests/setup.ts'],

    environment: 'node',
    globals: true,

    coverage: {
      enabled: false,
      provider: 'v8',
      reporter: ['text', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: [
        'node_modules/**',
        'dist/**',
        'bin/**',
        '**/*.test.ts',
        'vitest.config.ts'
      ],
      thresholds: {
        lines: 80,
        functions: 75,
        branches: 70,
        statements: 80
      }
    }
  }
})
