import { defineConfig } from 'tsup'

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['cjs', 'esm'],
  dts: true,
  outDir: 'dist/',
  clean: true,
  sourcemap: true,
  splitting: false,
  treeshake: true,
  target: ['es2022', 'node20'],
  platform: 'node',
  outExtension(ctx) {
    return {
      dts: ctx.format === 'cjs' ? '.d.cts' : '.d.ts',
      js: ctx.format === 'cjs' ? '.cjs' : '.mjs',
    }
  },
  // bundle the workspace package, keep registry dependencies external
  noExternal: ['@podlink/shared'],
  external: ['undici', 'zod'],
})
