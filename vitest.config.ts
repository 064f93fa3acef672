import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/__tests__/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      NEO4J_URI: 'bolt://localhost:7687',
      NEO4J_USER: 'neo4j',
      NEO4J_PASSWORD: 'test-secret',
      EMBEDDING_API_KEY: 'test-secret',
      EMBEDDING_MODEL: 'text-embedding-3-small',
    },
    testTimeout: 10000,
  },
});
