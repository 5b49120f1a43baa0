/**
 * Global test setup file for Vitest
 * Runs before every test file, before the modules under test create their loggers.
 */

process.env.LOG_LEVEL = process.env.TEST_LOG_LEVEL ?? 'silent';
