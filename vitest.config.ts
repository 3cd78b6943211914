import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['services/*/test/**/*.spec.ts'],
    environment: 'node',
    env: {
      STORE_BACKEND: 'memory',
      LOG_LEVEL: 'silent',
    },
  },
});
