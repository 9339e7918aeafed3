import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['services/**/*.test.ts', '*.test.ts'],
    environment: 'node',
  },
});
