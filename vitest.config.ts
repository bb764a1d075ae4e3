import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'error',
      SCHEDULER_ENABLED: 'false',
      CACHE_ENABLED: 'false',
    },
  },
});
