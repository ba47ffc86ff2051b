import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      PLAYPUSH_LOG_LEVEL: 'silent',
      PLAYPUSH_LOG_PRETTY: 'false',
    },
  },
});
