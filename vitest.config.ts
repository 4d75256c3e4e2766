import { defineConfig } from 'vitest/config';

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules/**'],

    testTimeout: 30000,
    hookTimeout: 30000,

    pool: 'forks',
    isolate: true,
    retry: isCI ? 1 : 0,

    environment: 'node',
    setupFiles: ['./tests/vitest.setup.ts'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/index.ts',
        'src/cli/index.ts',
        'src/types/**',
      ],
    },
  },
});
