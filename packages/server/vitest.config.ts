import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    coverage: {
      // Only include source files
      include: ['src/**/*.ts'],
      exclude: [
        // CLI entry point - exercised by hand
        'src/main.ts',
        // Test files
        'src/**/*.test.ts',
      ],
    },
  },
});
