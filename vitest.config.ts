import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const fromRoot = (relativePath: string) => fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
  test: {
    mockReset: true,
    include: ['src/**/*.test.ts', 'test/**/*.test.ts'],
    coverage: {
      reporter: ['text'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.{schema,types,error,const}.ts', 'src/main.ts'],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 90,
        statements: 80,
      },
    },
  },
  resolve: {
    alias: {
      '@constants': fromRoot('./src/constants'),
      '@models': fromRoot('./src/models'),
      '@errors': fromRoot('./src/errors'),
      '@utils': fromRoot('./src/utils'),
      '@services': fromRoot('./src/services'),
      '@indicators': fromRoot('./src/indicators'),
    },
  },
});
