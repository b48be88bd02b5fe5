import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['webdav/typescript/src/**/__tests__/**/*.test.ts'],
    testTimeout: 10000,
  },
});
