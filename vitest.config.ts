import os from 'node:os';
import path from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.spec.ts'],
    env: {
      RELAYDESK_DB_PATH: ':memory:',
      RELAYDESK_LOG_DIR: path.join(os.tmpdir(), 'relaydesk-test-logs'),
      RELAYDESK_CONFIG_PATH: path.join(os.tmpdir(), 'relaydesk-test-config', 'relaydesk.json'),
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'json-summary'],
      reportsDirectory: 'coverage',
      include: ['src/**/*.ts'],
      thresholds: {
        lines: 25,
        functions: 25,
        branches: 20,
        statements: 25,
      },
    },
  },
});
