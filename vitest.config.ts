import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*_test.ts'],
    clearMocks: true,
    restoreMocks: true,
  },
});
