import { defineConfig } from 'tsup';

export default defineConfig([
  // Main entry - universal (bundled chain definitions, no file system access)
  {
    entry: { 'index': 'index.ts' },
    format: ['esm', 'cjs'],
    dts: true,
    clean: true,
    splitting: false,
    sourcemap: true,
    platform: 'node',
    target: 'es2022',
    noExternal: [/^@noble\//],
  },
  // Node.js implementation (file-based definition loader)
  {
    entry: { 'impl/nodejs/index': 'impl/nodejs/index.ts' },
    format: ['esm', 'cjs'],
    dts: true,
    clean: false,
    splitting: false,
    sourcemap: true,
    platform: 'node',
    target: 'es2022',
  },
]);
