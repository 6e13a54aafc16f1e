import { fileURLToPath } from 'url'

import { defineConfig } from 'vitest/config'

function fromRoot(relative: string): string {
  return fileURLToPath(new URL(relative, import.meta.url))
}

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    // Each test file in its own worker so fake timers and stubbed globals never leak
    isolate: true,
    pool: 'threads',

    // Mock cleanup settings
    mockReset: true,
    clearMocks: true,
    restoreMocks: true,
    unstubGlobals: true,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        '**/*.test.ts',
        '**/index.ts',
        'src/types/**',
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
    // Mirrors "paths" in tsconfig.json
    alias: {
      '$types': fromRoot('./src/types'),
      '@boot': fromRoot('./src/boot'),
      '@classifier': fromRoot('./src/classifier'),
      '@controller': fromRoot('./src/controller'),
      '@inventory': fromRoot('./src/inventory'),
      '@logging': fromRoot('./src/logging'),
      '@monitor': fromRoot('./src/monitor'),
      '@records': fromRoot('./src/records'),
      '@reports': fromRoot('./src/reports'),
      '@selection': fromRoot('./src/selection'),
      '@utils': fromRoot('./src/utils'),
      '@validation': fromRoot('./src/validation'),
    },
  },
})
