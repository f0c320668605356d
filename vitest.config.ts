import { coverageConfigDefaults, defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['./src/**/*.test.ts', './e2e/**/*.test.ts'],
    coverage: {
      exclude: ['e2e/**', 'src/testing/**', '**/types/**', '**/*types.ts', ...coverageConfigDefaults.exclude],
    },
  },
});
