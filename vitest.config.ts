import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.test.ts', 'src/index.ts', 'src/__mocks__/**'],
    },
    testTimeout: 30000,
    hookTimeout: 30000,
    setupFiles: ['./src/setupTests.ts'],
    pool: 'threads',
  },
});
