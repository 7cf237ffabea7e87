import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@sqlweave/core': path.resolve(root, 'packages/core/src/index.ts'),
      '@sqlweave/mysql': path.resolve(root, 'packages/mysql/src/index.ts'),
      '@sqlweave/postgresql': path.resolve(root, 'packages/postgresql/src/index.ts'),
    },
  },
});
