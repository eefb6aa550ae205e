import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.spec.ts'],
    // better-sqlite3 is a native addon; keep each file in its own process
    pool: 'forks',
    env: {
      NODE_ENV: 'test',
    },
    testTimeout: 15000,
  },
});
