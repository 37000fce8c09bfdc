import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    // Synthesising the stack loads all of aws-cdk-lib
    testTimeout: 60_000,
  },
});
