import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration.
 *
 * Unit tests live under tests/unit and run with globals enabled so test files
 * can use describe/it/expect without imports.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: ['./tests/setup.ts'],
    testTimeout: 10000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', 'vitest.config.ts'],
    },
  },
});
