import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/cli.ts'],
  format: ['esm'],
  outDir: 'dist',
  clean: true,
  dts: false,
  sourcemap: true,
  target: 'node20',
  // Workspace packages point at TypeScript sources, so they are bundled in
  noExternal: [/^@devtasks\//],
  banner: {
    js: '#!/usr/bin/env node',
  },
});
