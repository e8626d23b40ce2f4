import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'level-format',
    environment: 'node',
    globals: true,
    include: ['src/**/*.test.ts'],
  },
});
