import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tokenizer/tests/**/*.test.ts'],
  },
});
