import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    env: {
      NODE_ENV: 'test',
      DATABASE_PATH: ':memory:',
      ACCOUNTS_COLLECTION: 'users',
      INFERENCE_API_TOKEN: 'test-token',
      INFERENCE_BASE_URL: 'http://inference.test',
      INFERENCE_MODEL: 'test-model',
    },
    environment: 'node',
    setupFiles: ['tests/setup-env.ts'],
    fileParallelism: false,
    isolate: true,
    testTimeout: 30000,
  },
})
