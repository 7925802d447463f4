import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  dts: true,
  // Bundle the @shellgate/* workspace packages so the published binary is
  // self-contained.
  noExternal: [/^@shellgate\//],
});
