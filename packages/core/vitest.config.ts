import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'core',
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/**/*.test.ts',
        // Barrel re-export files, no logic to test
        'src/**/index.ts',
        // Pure TypeScript type definitions, no runtime code
        'src/**/types.ts',
      ],
    },
    testTimeout: 10000,
  },
});
