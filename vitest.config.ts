import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['golden-file/src/**/*.test.ts']
  }
});
