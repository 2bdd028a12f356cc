import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'packages/*/tests/integration/**/*.test.ts'],
    testTimeout: 30000,
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
