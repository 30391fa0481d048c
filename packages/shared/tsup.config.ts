import { defineConfig } from 'tsup'

export default defineConfig({
  // Multiple entry points for sub-path exports
  entry: {
    'errors/index': 'src/errors/index.ts',
    'logger/index': 'src/logger/index.ts',
  },

  // Output formats
  format: ['esm', 'cjs'],
  dts: true,

  // Output configuration
  outDir: 'dist',
  clean: true,
  sourcemap: false,
  splitting: false,
  treeshake: true,

  // Target environment
  target: ['es2022', 'node20'],
  platform: 'node',

  // Output file extensions
  outExtension(ctx) {
    return {
      dts: ctx.format === 'cjs' ? '.d.cts' : '.d.ts',
      js: ctx.format === 'cjs' ? '.cjs' : '.js',
    }
  },
})
