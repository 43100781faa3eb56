import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  dts: true,
  clean: true,
  sourcemap: true,
  tsconfig: './tsconfig.build.json',
  outDir: 'dist',
  platform: 'node',
  target: 'node20',
  splitting: false,
  shims: false,
});
