import { defineConfig } from 'vitest/config';

export default defineConfig({
  // Keep local .env files out of test runs
  envDir: '.vitest-env',
  test: {
    pool: 'threads',
    include: ['src/**/*.test.ts'],
  },
});
