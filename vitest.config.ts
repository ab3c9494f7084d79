import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      DISPATCH_ENV: 'test',
      DISPATCH_LOG_LEVEL: 'silent',
    },
  },
});
