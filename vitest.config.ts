import { defineConfig } from 'vitest/config'
import { fileURLToPath } from 'node:url'

const resolveSrc = (dir: string): string => fileURLToPath(new URL(`./src/${dir}`, import.meta.url))

const sharedAliases = {
  '@app': resolveSrc('app'),
  '@config': resolveSrc('config'),
  '@core': resolveSrc('core'),
  '@infra': resolveSrc('infrastructure'),
  '@shared': resolveSrc('shared')
}

export default defineConfig({
  resolve: {
    alias: sharedAliases
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/unit/**/*.spec.ts', 'tests/integration/**/*.spec.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    setupFiles: ['tests/setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'json'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'tests/**', 'dist/**', '**/*.config.ts', 'src/index.ts'],
      thresholds: {
        statements: 65,
        branches: 60,
        functions: 65,
        lines: 65
      }
    }
  }
})
