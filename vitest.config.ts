import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const fromRoot = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['src/tests/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      TRANSFER_STORE: 'memory',
      ADMIN_API_KEY: 'test-admin-key',
      ADMIN_JWT_PUBLIC_KEY: 'test-secret'
    },
    coverage: {
      provider: 'v8',
      reportsDirectory: 'coverage'
    }
  },
  resolve: {
    alias: {
      '@config': fromRoot('./src/config'),
      '@controllers': fromRoot('./src/controllers'),
      '@services': fromRoot('./src/services'),
      '@clients': fromRoot('./src/clients'),
      '@infra': fromRoot('./src/infra'),
      '@lib': fromRoot('./src/lib'),
      '@middlewares': fromRoot('./src/middlewares'),
      '@routes': fromRoot('./src/routes'),
      '@app-types': fromRoot('./src/types')
    }
  }
});
