import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  dts: false,
  clean: true,
  sourcemap: true,
  target: 'node20',
  outDir: 'dist',
  splitting: false,
  // Sources use extensionless imports, so the CLI ships as one ESM file
  bundle: true,
  external: [
    'chalk',
    'commander',
    'fast-glob',
    'micromatch',
    'strip-ansi',
    'zod'
  ]
});
