import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['lib/src/**/*.ts'],
      exclude: ['lib/src/**/*.d.ts', 'lib/src/**/index.ts'],
    },
    // Timeout for each test
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      '@retry-runner/lib': new URL('./lib/src/index.ts', import.meta.url).pathname,
    },
  },
});
