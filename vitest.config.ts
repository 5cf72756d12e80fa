import path from 'path'

import { defineConfig } from 'vitest/config'

const src = (dir: string): string => path.resolve(__dirname, 'src', dir)

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    isolate: true,
    pool: 'threads',

    clearMocks: true,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/**',
        '**/*.test.ts',
        '**/*.config.{ts,js}',
        'coverage/**',
        'dist/**',
        'src/boot/main.ts',
      ],
      thresholds: {
        branches: 85,
        functions: 90,
        lines: 90,
        statements: 90,
      },
    },

    include: ['src/**/*.test.ts'],
  },
  resolve: {
    // Mirrors the "paths" block in tsconfig.json
    alias: {
      '$types': src('types'),
      '@boot': src('boot'),
      '@core': src('core'),
      '@features': src('features'),
      '@hardware': src('hardware'),
      '@logging': src('logging'),
      '@persistence': src('persistence'),
      '@system': src('system'),
      '@utils': src('utils'),
      '@validation': src('validation'),
    },
  },
})
