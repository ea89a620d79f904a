import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20_000,
    env: {
      TASKRUNNER_QUIET: '0',
      TASKRUNNER_VERBOSE: '0'
    }
  }
});
