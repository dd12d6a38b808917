import { defineConfig } from 'tsup';

export default defineConfig([
  {
    clean: true,
    dts: {
      entry: {
        index: 'src/index.ts',
      },
    },
    entry: {
      'bin/localegate': 'src/bin/localegate.ts',
      index: 'src/index.ts',
    },
    format: ['esm'],
    minify: false,
    outDir: 'dist',
    platform: 'node',
    shims: false,
    skipNodeModulesBundle: true,
    sourcemap: true,
    splitting: false,
    target: 'node20',
    treeshake: true,
  },
]);
