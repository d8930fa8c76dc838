import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    env: { GRAPHBUF_LOG_LEVEL: 'silent' },
  },
});
