import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',

    include: ['docker-engine/typescript/src/**/__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['docker-engine/typescript/src/**/*.ts'],
      exclude: ['**/__tests__/**', '**/__mocks__/**', '**/types/**', 'docker-engine/typescript/src/index.ts'],
    },

    testTimeout: 10000,
    watch: false,

    clearMocks: true,
  },
});
