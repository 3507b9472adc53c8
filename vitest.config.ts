import { defineConfig } from 'vitest/config';

// Host-clock expectations in the tests assume UTC
process.env.TZ = 'UTC';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
  },
});
