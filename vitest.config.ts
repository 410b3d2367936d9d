import { defineConfig } from 'vitest/config';

// https://vitest.dev/config
export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // better-sqlite3 is a native module; keep it out of worker threads
    pool: 'forks',
  },
});
