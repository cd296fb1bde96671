import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/unit/**/*.spec.ts'],
    setupFiles: ['test/setup/resetExitCode.ts'],
    env: {
      NODE_ENV: 'test',
    },
    coverage: {
      enabled: false,
    },
  },
});
