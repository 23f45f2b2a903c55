import os from 'node:os';
import { defineConfig } from 'vitest/config';

const isCI = process.env.CI === 'true' || process.env.GITHUB_ACTIONS === 'true';
const localWorkers = Math.max(2, Math.min(8, os.cpus().length));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    pool: 'forks',
    poolOptions: {
      forks: {
        execArgv: [],
      },
    },
    maxWorkers: isCI ? 2 : localWorkers,
    hookTimeout: 30_000,
    include: ['packages/*/src/**/*.test.ts', 'packages/*/test/**/*.test.ts', 'test/**/*.test.ts'],
    exclude: ['dist/**', 'node_modules/**'],
    setupFiles: ['test/setup.ts'],
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/server/src/main.ts'],
      thresholds: {
        statements: 70,
        branches: 70,
        functions: 70,
        lines: 60,
      },
    },
  },
});
