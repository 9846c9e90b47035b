import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'server',
    environment: 'node',
    include: ['src/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      SUPABASE_URL: 'http://localhost:54321',
      SUPABASE_SERVICE_ROLE_KEY: 'test-service-role-key',
      JWT_SECRET_KEY: 'test-secret',
      BCRYPT_ROUNDS: '4',
      LOG_LEVEL: 'silent',
      LOG_PRETTY: 'false',
    },
  },
});
