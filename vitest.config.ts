import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'json'],
      include: [
        'core/**/*.ts',
        'input/**/*.ts',
        'registry/**/*.ts',
        'pipelines/**/*.ts',
        'identification/**/*.ts',
        'impl/**/*.ts',
      ],
      exclude: ['**/index.ts', '**/*.test.ts'],
    },
    testTimeout: 10000,
  },
});
