import { describe, expect, it } from 'vitest';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('falls back to development defaults', () => {
    expect(loadConfig({})).toEqual({
      nodeEnv: 'development',
      production: false,
      port: 5000,
      databasePath: './expenses.db',
      sessionSecret: 'dev-only-session-secret',
      usingDevSecret: true,
      logLevel: 'info'
    });
  });

  it('reads explicit values', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      PORT: '8080',
      DATABASE_PATH: '/var/lib/expenses.db',
      SESSION_SECRET: 'test-secret',
      LOG_LEVEL: 'debug'
    });
    expect(config).toEqual({
      nodeEnv: 'production',
      production: true,
      port: 8080,
      databasePath: '/var/lib/expenses.db',
      sessionSecret: 'test-secret',
      usingDevSecret: false,
      logLevel: 'debug'
    });
  });

  it('requires a session secret in production', () => {
    expect(() => loadConfig({ NODE_ENV: 'production' })).toThrow('SESSION_SECRET is required when NODE_ENV=production.');
  });

  it('rejects a non-numeric port', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(/^Invalid configuration\. PORT: /);
  });
});
