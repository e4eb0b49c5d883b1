import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'SILENT',
      LLM_PROVIDER: 'anthropic',
      ANTHROPIC_API_KEY: 'test-key',
      DATABASE_TYPE: 'sqlite3',
      DATABASE_PATH: ':memory:',
      CATALOG_DIR: './.verisql-test/catalogs',
    },
  },
});
