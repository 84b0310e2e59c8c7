import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const source = (pkg: string) => fileURLToPath(new URL(`./${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    env: {
      NODE_ENV: 'test',
    },
    setupFiles: ['./tests/setup.ts'],
    include: ['audio/test/**/*.test.ts', 'gateway/test/**/*.test.ts', 'packages/*/test/**/*.test.ts'],
    testTimeout: 10000,
    hookTimeout: 10000,
    pool: 'forks',
  },
  resolve: {
    alias: {
      '@music-bot/logger': source('packages/logger'),
      '@music-bot/config': source('packages/config'),
      '@music-bot/audio': source('audio'),
    },
  },
});
