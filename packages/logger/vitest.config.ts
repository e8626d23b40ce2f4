import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'logger',
    environment: 'node',
    globals: true,
    include: ['src/**/*.test.ts'],
  },
});
