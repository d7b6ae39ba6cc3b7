import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: [
      {
        test: {
          name: 'unit',
          include: ['tests/unit/**/*.test.ts'],
          testTimeout: 5000,
        },
      },
      {
        // the service imports the library by package name; resolve it to the sources
        resolve: {
          alias: {
            'records-querier': fileURLToPath(new URL('./src/index.ts', import.meta.url)),
          },
        },
        test: {
          name: 'app',
          include: ['records-app/**/*.test.ts'],
          testTimeout: 5000,
        },
      },
    ],
  },
});
