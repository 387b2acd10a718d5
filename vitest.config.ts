import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration for cmdtree
 */
export default defineConfig({
  test: {
    globals: true,
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 30_000,
    pool: 'forks'
  }
});
