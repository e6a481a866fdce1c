import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.spec.ts'],
    env: {
      NODE_ENV: 'test',
      JWT_SECRET: 'test-secret',
      LOG_TO_FILE: 'false',
    },
  },
});
