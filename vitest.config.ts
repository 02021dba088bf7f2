import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    // Each test file in its own worker
    isolate: true,
    pool: 'threads',

    // Mock cleanup settings
    mockReset: true,
    clearMocks: true,
    restoreMocks: true,

    // Coverage configuration (npm run test:coverage)
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        '**/*.test.ts',
        'src/test-utils/**',
        'src/boot/main.ts',
      ],
      thresholds: {
        branches: 90,
        functions: 95,
        lines: 95,
        statements: 95,
      },
    },

    include: ['src/**/*.test.ts'],
  },
})
