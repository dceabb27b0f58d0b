import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['{common,providers,sources,controller}/**/*_test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
