import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    isolate: true,
    include: ['packages/*/__tests__/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/index.ts', 'packages/cli/src/cli.ts'],
    },
    restoreMocks: true,
  },
  resolve: {
    alias: {
      // Use source files directly for tests (no build required)
      '@unitfleet/core': path.resolve(rootDir, 'packages/core/src/index.ts'),
      '@unitfleet/apps': path.resolve(rootDir, 'packages/apps/src/index.ts'),
      '@unitfleet/cli': path.resolve(rootDir, 'packages/cli/src/index.ts'),
      '@unitfleet/test-utils': path.resolve(rootDir, 'packages/test-utils/src/index.ts'),
    },
  },
});
