import { defineConfig, type Options } from 'tsup';

const shared: Options = {
  format: ['esm', 'cjs'],
  dts: true,
  splitting: false,
  sourcemap: true,
  shims: true,
  target: 'node20',
  outDir: 'dist',
};

export default defineConfig([
  {
    ...shared,
    entry: {
      index: 'src/index.ts',
      runtime: 'src/runtime/index.ts',
    },
    clean: true,
  },
  {
    ...shared,
    entry: {
      cli: 'src/cli/index.ts',
    },
    // Only the CLI entry point gets a shebang
    banner: {
      js: '#!/usr/bin/env node',
    },
  },
]);
