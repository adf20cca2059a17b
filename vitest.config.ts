import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
    restoreMocks: true,
    env: {
      MCP_LOG_LEVEL: 'silent'
    }
  }
});
