import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
      TZ: 'UTC',
      RETRY_BACKOFF_BASE: '5',
    },
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
