import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@duplex-hub/shared': path.resolve(rootDir, 'packages/shared/src'),
      '@duplex-hub/server': path.resolve(rootDir, 'packages/server/src'),
      '@duplex-hub/web-client': path.resolve(rootDir, 'packages/web-client/src'),
    },
  },
  test: {
    environment: 'node',
    include: [
      'packages/shared/src/**/*.test.ts',
      'packages/server/src/**/*.test.ts',
      'packages/web-client/src/**/*.test.ts',
    ],
  },
});
