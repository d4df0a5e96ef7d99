import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const repoRoot = path.dirname(fileURLToPath(import.meta.url));
const alias = {
  '@edgekit/resilient-http-core': path.resolve(repoRoot, 'libs/resilient-http-core/src/index.ts'),
  '@edgekit/resilient-http-pagination': path.resolve(repoRoot, 'libs/resilient-http-pagination/src/index.ts'),
  '@edgekit/edge-api-client': path.resolve(repoRoot, 'libs/edge-api-client/src/index.ts'),
};

export default defineConfig({
  test: {
    environment: 'node',
    include: ['libs/*/src/**/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
