import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.integration.spec.ts'],
    setupFiles: ['./test/helpers/install-host.ts'],
    testTimeout: 10000,
    pool: 'forks',
  },
});
