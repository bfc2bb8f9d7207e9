import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./tests/setup.ts'],
    include: ['tests/unit/**/*.test.ts'],
    // Pool configuration
    pool: 'threads',
    fileParallelism: process.env.CI ? false : true,
    // Test timeouts
    testTimeout: 30000,
    hookTimeout: 30000,
    // Auto-cleanup between tests
    mockReset: true,
    restoreMocks: true,
    clearMocks: true,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/**', 'dist/**', 'tests/**', '**/*.test.ts', '**/*.config.ts'],
    },
  },
});
