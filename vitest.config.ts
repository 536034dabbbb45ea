import { defineConfig } from 'vitest/config';

/**
 * One run covers every workspace package. Property tests pin their own
 * fast-check seed, so runs are deterministic without global setup.
 */
export default defineConfig({
  test: {
    environment: 'node',

    include: ['packages/**/src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    // No retries - surface issues immediately
    retry: 0,

    // Extended timeout for property-based testing
    testTimeout: 10000,

    env: {
      NODE_ENV: 'test',
    },
  },
});
