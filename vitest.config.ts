import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const alias = {
  '@restwell/request-core': fileURLToPath(new URL('./libs/request-core/src/index.ts', import.meta.url)),
  '@restwell/resources': fileURLToPath(new URL('./libs/resources/src/index.ts', import.meta.url)),
};

export default defineConfig({
  test: {
    environment: 'node',
    include: ['libs/*/src/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
