import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration
 *
 * Every test runs in-process against fake providers, an in-memory SQLite
 * database or a stubbed `fetch`; nothing reaches the network.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.test.ts',
        'vitest.config.ts',
        'vitest.setup.ts',
      ],
    },
  },
});
