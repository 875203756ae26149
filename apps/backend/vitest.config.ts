import { defineConfig } from 'vitest/config';
import type { UserWorkspaceConfig } from 'vitest/config';

// Unit tests project - fast, isolated, in-memory storage only
const unitProject: UserWorkspaceConfig = {
  test: {
    name: 'unit',
    include: ['tests/**/*.test.ts'],
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
      'tests/**/*.integration.test.ts',
      'tests/integration/**',
    ],
    globals: true,
    environment: 'node',
    setupFiles: ['./tests/setup.ts'],
    testTimeout: 10000,
    hookTimeout: 10000,
    mockReset: true,
    restoreMocks: true,
    clearMocks: true,
    sequence: {
      groupOrder: 1,
    },
  },
};

// Integration tests project - full service workflows across storage drivers
const integrationProject: UserWorkspaceConfig = {
  test: {
    name: 'integration',
    include: [
      'tests/**/*.integration.test.ts',
      'tests/integration/**/*.test.ts',
    ],
    exclude: ['**/node_modules/**', '**/dist/**'],
    globals: true,
    environment: 'node',
    setupFiles: ['./tests/setup.ts'],
    testTimeout: 30000,
    hookTimeout: 30000,
    mockReset: true,
    restoreMocks: true,
    clearMocks: true,
    // Integration tests run sequentially
    pool: 'forks',
    fileParallelism: false,
    sequence: {
      groupOrder: 2,
    },
  },
};

export default defineConfig({
  test: {
    projects: [unitProject, integrationProject],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary', 'lcov'],
      exclude: [
        'node_modules/',
        'dist/',
        'coverage/',
        '**/*.test.ts',
        '**/tests/**',
        'src/index.ts',
        'src/config/**',
        'src/constants.ts',
      ],
      include: ['src/**/*.ts'],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
    },
  },
});
