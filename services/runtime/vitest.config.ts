import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'runtime',
    environment: 'node',
    globals: true,
    setupFiles: ['./vitest.setup.ts'],
    include: ['src/**/*.test.ts', 'test/**/*.spec.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['**/*.d.ts', 'src/index.ts', 'src/metrics-server.ts'],
    },
  },
});
