import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    globals: true,
    environment: 'node',
    env: {
      NODE_ENV: 'test',
      SUPPRESS_NO_CONFIG_WARNING: 'true'
    }
  }
});
