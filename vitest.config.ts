import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', 'dist'],
    testTimeout: 30000,
  },
  resolve: {
    alias: {
      '@supplier-compliance/shared': path.resolve(rootDir, './src/backend/shared/src/index.ts'),
      '@supplier-compliance/engine': path.resolve(rootDir, './src/backend/compliance-engine/src/index.ts'),
    },
  },
});
