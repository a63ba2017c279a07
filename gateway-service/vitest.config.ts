import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    testTimeout: 15000,
    hookTimeout: 10000,
    teardownTimeout: 10000,
  },
});
