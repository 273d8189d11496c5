import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: [
      'packages/*/src/**/*.test.ts',
      'app/src/**/*.test.ts',
      'plugins/*/src/**/*.test.ts',
    ],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: [
        'packages/*/src/**/*.ts',
        'app/src/**/*.ts',
        'plugins/*/src/**/*.ts',
      ],
      exclude: ['**/__tests__/**', '**/index.ts'],
      thresholds: { lines: 80, functions: 80, branches: 70 },
    },
  },
});
