import { defineConfig } from 'vitest/config'
import { resolve } from 'node:path'
import { config as loadEnv } from 'dotenv'
import { existsSync } from 'node:fs'

const envPath = resolve(__dirname, '.env')
if (existsSync(envPath)) {
  loadEnv({ path: envPath, override: true })
}

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/**/tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '**/*.d.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/dist/**', '**/*.d.ts'],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
    },
  },
})
