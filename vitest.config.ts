import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 15_000,
    env: {
      INSIGHTS_LOG_LEVEL: 'silent',
    },
  },
});
