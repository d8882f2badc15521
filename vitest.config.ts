import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
    include: ['tests/**/*.test.ts'],
    testTimeout: 30_000,
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'SILENT',
      DB_TYPE: 'sqlite',
      DB_NAME: ':memory:',
    },
  },
});
