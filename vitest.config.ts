import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import { resolve } from 'path';

const __dirname = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@': resolve(__dirname, 'src'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      // Fake credentials so modules initialise without throwing
      WP_DOMAIN: 'https://blog.example.test',
      WP_USERNAME: 'test-editor',
      WP_APP_PASSWORD: 'test-app-password',
      OPENAI_API_KEY: 'test-openai-key',
      OPENAI_MODEL: 'gpt-4o',
      OPENAI_SOCIAL_MODEL: 'gpt-4o-mini',
      LLM_PROVIDER: 'openai',
      DB_PATH: ':memory:',
    },
  },
});
