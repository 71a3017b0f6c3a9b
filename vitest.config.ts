import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/tests/**/*.spec.ts'],
    exclude: ['dist/**', 'node_modules/**'],
    environment: 'node',
    testTimeout: 15000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'lcov'],
      reportsDirectory: 'coverage',
      include: [
        'src/services/**',
        'src/config/**',
        'src/cli/**',
        'src/models/**'
      ],
      exclude: [
        'src/tests/**',
        'src/services/playwrightDriver.ts',
        '**/*.d.ts'
      ]
    }
  }
});
