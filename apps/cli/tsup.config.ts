import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  clean: true,
  bundle: true,
  splitting: false,
  treeshake: true,
  // Workspace packages ship TypeScript sources
  noExternal: [/^@sluice\//],
  banner: {
    js: '#!/usr/bin/env node',
  },
});
