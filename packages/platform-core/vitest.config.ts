import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    testTimeout: 10000,
    include: ['src/**/*.test.ts', 'src/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
  resolve: {
    alias: {
      '@folio/platform-core': path.resolve(root, '../../packages/platform-core/src/index.ts'),
      '@folio/shared-contracts': path.resolve(root, '../../packages/shared/contracts/src/index.ts'),
    },
  },
});
