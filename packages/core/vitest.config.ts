import { defineConfig } from 'vitest/config';

// Environment-based configuration
const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    name: '@faultbranch/core',
    environment: 'node',
    include: ['src/**/*.test.ts', 'src/**/__tests__/**/*.test.ts'],
    setupFiles: ['./src/test-utils/fast-check-setup.ts'],
    // Configuration for property-based testing with fast-check
    testTimeout: isCI ? 30000 : 10000,
    env: {
      TEST_SEED: '424242',
      FC_NUM_RUNS: isCI ? '1000' : '100',
    },
  },
});
