import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const resolveSource = (relative: string): string =>
  fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      // Resolve workspace packages to their source files for testing
      '@streamvault/types': resolveSource('./packages/types/src/index.ts'),
      '@streamvault/core': resolveSource('./packages/core/src/index.ts'),
      '@streamvault/domain': resolveSource('./packages/domain/src/index.ts'),
    },
  },
});
