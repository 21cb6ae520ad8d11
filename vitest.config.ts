import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    environment: 'node',
    env: {
      NODE_ENV: 'test',
    },
    // PGlite needs a moment to boot per suite
    testTimeout: 20000,
    hookTimeout: 30000,
  },
});
