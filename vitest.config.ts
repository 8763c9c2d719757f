import { defineConfig } from 'vitest/config';

// force vitest to use CI mode to avoid watch mode
process.env.CI = 'true';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: false,
        maxForks: 8,
      },
    },
    maxConcurrency: 5,
    exclude: ['**/node_modules/**', '**/dist/**'],
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
