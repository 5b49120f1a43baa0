/// <reference types="vitest" />
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Environment configuration
    environment: 'node',

    // Test file patterns
    include: ['src/**/*.test.ts', 'test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    globals: false, // Explicit imports from 'vitest'

    // Test execution
    pool: 'threads',
    isolate: true,

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['**/*.test.ts', 'src/task.types.ts'],
    },

    // Timeouts
    testTimeout: 10000,
    hookTimeout: 10000,

    watch: false,

    // Silences the logger before any module under test builds one
    setupFiles: ['./test/setup.ts'],

    allowOnly: !process.env.CI,
    passWithNoTests: false,

    typecheck: {
      enabled: false, // tsc runs separately
    },
  },
});
