import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import path from 'path';

const projectRoot = path.dirname(fileURLToPath(new URL(import.meta.url)));
const resolveFromRoot = (p: string) => path.join(projectRoot, p);

export default defineConfig({
  test: {
    include: [
      'packages/**/tests/unit/**/*.test.ts',
      'packages/**/tests/integration/**/*.test.ts',
      'packages/**/tests/properties/**/*.test.ts',
    ],
    exclude: ['node_modules', 'dist', '**/node_modules/**', '**/dist/**'],
    environment: 'node',
    globals: true,
    clearMocks: true,
    restoreMocks: true,
    setupFiles: ['tests/setup.ts'],
    testTimeout: 5000,
    env: {
      NODE_ENV: 'test',
      LOG_FILE: 'false',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      reportsDirectory: 'coverage',
      include: ['packages/**/src/**/*.ts'],
      exclude: ['packages/**/src/**/index.ts', 'packages/cli/src/bin/**'],
    },
  },
  resolve: {
    alias: {
      '@rhodl-sync/core': resolveFromRoot('packages/core/src/index.ts'),
      '@rhodl-sync/utils': resolveFromRoot('packages/utils/src/index.ts'),
      '@rhodl-sync/api-clients': resolveFromRoot('packages/api-clients/src/index.ts'),
      '@rhodl-sync/storage': resolveFromRoot('packages/storage/src/index.ts'),
      '@rhodl-sync/workflows': resolveFromRoot('packages/workflows/src/index.ts'),
    },
  },
});
