import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    // File dialog tests touch a temp directory; keep headroom on slow CI disks
    testTimeout: 20000,
    setupFiles: ['./tests/setup-tests.ts'],
  },
});
