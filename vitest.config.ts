import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['sdks/typescript/*/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
  },
});
