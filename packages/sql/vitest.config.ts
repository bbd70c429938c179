import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    name: 'sql',
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: {
      FRAMEPORT_LOG_LEVEL: 'silent',
    },
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts'],
    },
  },
  resolve: {
    alias: {
      '@frameport/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
    },
  },
});
