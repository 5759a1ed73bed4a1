import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    // Environment is validated when src/config/environment.ts is first imported
    env: {
      BOT_TOKEN: 'test-token',
      CLIENT_ID: 'test-client',
      NODE_ENV: 'test',
      STORAGE_DRIVER: 'memory',
      LOG_LEVEL: 'error',
      BOT_OWNER_IDS: '100,200',
    },
  },
});
