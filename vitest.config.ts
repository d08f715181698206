import { defineConfig } from 'vitest/config';

const coverageEnabled = process.env.COVERAGE === 'true';

export default defineConfig({
  test: {
    environment: 'node',
    include: [ 'tests/**/*.test.ts' ],
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ],
    setupFiles: [ 'tests/vitest.setup.ts' ],
    globals: true,
    coverage: {
      enabled: coverageEnabled,
      provider: 'v8',
      reportsDirectory: 'coverage',
      include: [ 'src/**/*.ts' ],
      reporter: [ 'text', 'text-summary', 'lcov' ],
    },
  },
});
