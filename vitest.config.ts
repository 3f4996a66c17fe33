import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Mock servers bind real loopback sockets; keep files sequential
    pool: 'forks',
    poolOptions: {
      forks: {
        maxForks: 2,
        minForks: 1,
      },
    },
    fileParallelism: false,

    include: ['test/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    testTimeout: 15000,
  },
});
