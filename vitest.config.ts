import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    watch: false,
    include: ['tests/**/*.test.ts'],
    testTimeout: 10000,
    isolate: true,
    pool: 'forks',
  },
});
