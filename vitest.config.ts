import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: [
      'core/src/**/*.test.ts',
      'core/tests/**/*.test.ts',
      'providers/src/**/*.test.ts',
      'cli/src/**/*.test.ts',
    ],
    exclude: ['node_modules/**', 'dist/**'],
  },
  resolve: {
    alias: [
      {
        find: '@keyreel/core',
        replacement: new URL('./core/src/index.ts', import.meta.url).pathname,
      },
      {
        find: '@keyreel/providers',
        replacement: new URL('./providers/src/index.ts', import.meta.url).pathname,
      },
    ],
  },
});
