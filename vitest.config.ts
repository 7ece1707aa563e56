import { defineConfig } from 'vitest/config';

/**
 * Root Vitest configuration
 *
 * Each workspace package is a project with its own config; this file only
 * carries the settings shared by the whole run.
 */

// Environment-based configuration
const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    // Projects configuration for monorepo - each package is a project
    projects: ['packages/*'],

    // No retries - surface issues immediately
    retry: 0,

    // Disable file parallelization in CI for deterministic results
    fileParallelism: !isCI,

    reporters: ['default'],

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'lcov', 'json-summary'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.d.ts',
        'packages/*/src/**/*.{test,spec}.ts',
        'packages/*/src/**/__tests__/**',
        'packages/*/src/test-utils/**',
      ],
    },
  },
});
