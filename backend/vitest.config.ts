import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Run tests in Node environment
    environment: 'node',

    // Enable globals for describe, it, expect, etc.
    globals: true,

    // Test file patterns
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],

    exclude: ['node_modules', 'dist'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.d.ts',
        '**/*.test.ts',
        'vitest.config.ts',
        'scripts/',
      ],
    },

    // Setup files to run before tests
    setupFiles: ['./tests/setup.ts'],

    testTimeout: 10000,
  },
});
