import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    setupFiles: ['./test/unit/setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      exclude: [
        'node_modules/',
        'test/',
        'dist/',
        '**/*.spec.ts',
        'vitest.config.ts',
      ],
      include: [
        'src/infrastructure/adapters/**/*.ts',
        'src/application/use-cases/**/*.ts',
        'src/domain/**/*.ts',
        'src/shared/**/*.ts',
      ],
    },
    include: ['test/unit/**/*.spec.ts'],
    exclude: ['node_modules/', 'dist/'],
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
