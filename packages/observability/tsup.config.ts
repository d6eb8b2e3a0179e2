import { defineConfig } from 'tsup';

export default defineConfig({
  entry: { index: 'src/index.ts' },
  format: ['esm'],
  dts: true,
  // Native module; resolved from node_modules at runtime.
  external: ['better-sqlite3'],
});
