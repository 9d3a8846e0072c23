import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const workspace = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@hostpulse/shared': workspace('shared'),
      '@hostpulse/agent': workspace('agent'),
      '@hostpulse/receiver': workspace('receiver'),
    },
  },
  test: {
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    env: {
      HOSTPULSE_LOG_LEVEL: 'fatal',
      HOSTPULSE_LOG_FORMAT: 'json',
    },
  },
});
