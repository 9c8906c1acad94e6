import { defineConfig } from 'tsup'

export default defineConfig({
  entry: ['src/bin.ts'],
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  sourcemap: true,
  clean: true,
  // The core ships TypeScript sources; bundle it, keep its dependencies external.
  noExternal: ['lockbox'],
})
