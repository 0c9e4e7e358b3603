import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['check-data-sources/src/**/*.test.ts'],
    environment: 'node'
  }
});
