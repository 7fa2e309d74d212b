import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts', 'api/**/*.test.ts'],
    environment: 'node',
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts', 'api/**/*.ts'],
      exclude: [
        'src/**/*.test.ts',
        'api/**/*.test.ts',
        'src/test-utils/**',
        'src/scripts/**',
      ],
      reporter: ['text', 'text-summary'],
    },
  },
});
