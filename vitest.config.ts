import { defineConfig } from 'vitest/config';

/**
 * Tests run against an in-memory SQLite knex and a scripted gateway,
 * so nothing here needs Postgres or network access.
 */
export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent',
      API_ACCESS_KEY: '',
      GATEWAY_WEBHOOK_SECRET: '',
    },
    testTimeout: 10_000,
  },
});
