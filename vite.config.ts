import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.spec.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: [
        'src/**/*.spec.ts',
        'src/bin/cli.ts', // yargs wiring - commands are tested directly
        'src/interfaces/**', // Type definitions only
        'src/index.ts', // Re-exports only
      ],
    },
  },
});
