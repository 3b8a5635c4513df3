import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['pcloud/typescript/src/**/*.test.ts'],
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
