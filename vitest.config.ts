import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./server/tests/setup.ts'],
    include: ['server/tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['server/utils/keywords/**', 'server/cli.ts', 'server/routes.ts'],
      exclude: ['**/node_modules/**', '**/tests/**', '**/*.test.ts'],
    },
    testTimeout: 10000,
  },
});
