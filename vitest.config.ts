import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    env: {
      KUBE_LINEAGE_LOG_LEVEL: 'silent',
    },
  },
});
