import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const here = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    root: here,
    globals: true,
    environment: 'node',
    include: [
      'src/**/*.test.ts',
      'test/**/*.test.ts',
      'test/**/*.integration.ts',
    ],
    testTimeout: 15000,
    hookTimeout: 30000,
  },
  resolve: {
    alias: [
      {
        find: /^@labtally\/shared$/,
        replacement: path.resolve(here, '../../packages/shared/src/index.ts'),
      },
      {
        find: /^@labtally\/shared\//,
        replacement: `${path.resolve(here, '../../packages/shared/src')}/`,
      },
    ],
  },
});
