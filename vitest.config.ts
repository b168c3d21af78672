import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['services/*/test/**/*.spec.ts'],
    testTimeout: 20_000,
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      DATABASE_URL: 'postgres://localhost:5432/identity_test',
      JWT_ACCESS_SECRET: 'test-secret-test-secret-test-secret',
      COOKIE_SECURE: 'false',
    },
  },
});
