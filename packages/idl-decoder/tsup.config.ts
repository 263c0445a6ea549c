import { defineConfig } from 'tsup';

export default defineConfig((options) => ({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  dts: !options.watch,
  tsconfig: './tsconfig.json',
  sourcemap: true,
  clean: true,
  external: ['@noble/hashes', '@solana/codecs', '@solana/addresses'],
}));
