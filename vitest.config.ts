import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    testTimeout: 20_000,
    pool: 'forks',
    poolOptions: {
      forks: { singleFork: true }, // better-sqlite3 handles are per-process
    },
  },
});
