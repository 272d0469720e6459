import path from 'path'

import { defineConfig } from 'vitest/config'

const src = (dir: string) => path.resolve(__dirname, './src', dir)

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    isolate: true,
    pool: 'threads',

    mockReset: true,
    clearMocks: true,
    restoreMocks: true,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        'node_modules/**',
        '**/*.test.ts',
        '**/*.config.ts',
        'src/boot/main.ts',
        'src/test-utils/**',
        'coverage/**',
        'dist/**',
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
    alias: {
      '$types': src('types'),
      '@boot': src('boot'),
      '@core': src('core'),
      '@datasource': src('datasource'),
      '@features': src('features'),
      '@logging': src('logging'),
      '@notifiers': src('notifiers'),
      '@system': src('system'),
      '@utils': src('utils'),
      '@validation': src('validation'),
    },
  },
})
