import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: [
      'src/**/*.test.ts',
      'test/**/*.test.ts',
      'test/**/*.integration.ts',
      'test/**/*.security.ts',
    ],
    setupFiles: [],
    testTimeout: 15000,
    hookTimeout: 30000,
  },
  resolve: {
    alias: {
      '@codeplan/shared': fileURLToPath(new URL('../../packages/shared/src', import.meta.url)),
    },
  },
});
