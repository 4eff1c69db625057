import { defineConfig } from 'tsup'

export default defineConfig({
  entry: {
    'core/index': 'src/core/index.ts',
  },
  format: ['esm'],
  dts: true,
  splitting: false,
  clean: true,
  treeshake: true,
  outExtension: () => ({ js: '.mjs' }),
  external: ['better-sqlite3'],
})
