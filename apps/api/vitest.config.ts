import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      // index.ts only listens; db.ts is replaced by a mock in every suite
      exclude: ['src/index.ts', 'src/db.ts'],
      thresholds: {
        statements: 90,
        branches: 85,
        functions: 90,
        lines: 90,
      },
    },
    projects: [
      {
        test: {
          name: 'unit',
          include: ['__tests__/unit/**/*.test.ts'],
          globals: true,
        },
      },
      {
        test: {
          name: 'integration',
          include: ['__tests__/integration/**/*.test.ts'],
          globals: true,
          testTimeout: 30000,
        },
      },
      {
        test: {
          name: 'contract',
          include: ['__tests__/contract/**/*.test.ts'],
          globals: true,
        },
      },
    ],
  },
});
