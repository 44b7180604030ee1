import { defineConfig } from 'tsup';

export default defineConfig([
  {
    entry: {
      index: 'src/index.ts',
    },
    format: ['esm', 'cjs'],
    splitting: false,
    sourcemap: true,
    dts: {
      entry: {
        index: 'src/index.ts',
      },
    },
    clean: true,
    target: 'es2022',
    bundle: true,
  },
]);
