import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      DRY_AI_LOG_LEVEL: 'silent',
    },
  },
});
