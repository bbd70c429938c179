import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm', 'cjs'],
  dts: true,
  clean: true,
  target: 'es2022',
  splitting: false,
  sourcemap: true,
  external: ['@frameport/core', 'papaparse', 'yaml', 'msgpackr', 'apache-arrow', 'hyparquet', 'hyparquet-writer', 'zod'],
});
