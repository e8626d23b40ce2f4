import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'tuning',
    environment: 'node',
    globals: true,
    include: ['src/**/*.test.ts'],
  },
});
