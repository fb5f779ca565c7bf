import { describe, it, expect } from 'vitest';
import { loadCredentials, loadRuntimeConfig } from './env.js';

describe('loadCredentials', () => {
  it('returns trimmed credentials', () => {
    const result = loadCredentials({
      BINANCE_API_KEY: ' test-key ',
      BINANCE_API_SECRET: 'test-secret',
    });

    expect(result).toEqual({ ok: true, value: { apiKey: 'test-key', apiSecret: 'test-secret' } });
  });

  it('reports every missing variable', () => {
    const result = loadCredentials({ BINANCE_API_SECRET: '   ' });

    expect(result).toEqual({
      ok: false,
      error: {
        kind: 'CONFIGURATION',
        missing: ['BINANCE_API_KEY', 'BINANCE_API_SECRET'],
        message: 'API credentials not found: BINANCE_API_KEY, BINANCE_API_SECRET',
      },
    });
  });
});

describe('loadRuntimeConfig', () => {
  it('defaults to testnet, ./logs and INFO', () => {
    expect(loadRuntimeConfig({})).toEqual({ testnet: true, logDir: 'logs', logLevel: 'INFO' });
  });

  it('reads overrides', () => {
    expect(
      loadRuntimeConfig({ BINANCE_TESTNET: 'false', LOG_DIR: '/tmp/orders', LOG_LEVEL: 'debug' }),
    ).toEqual({ testnet: false, logDir: '/tmp/orders', logLevel: 'DEBUG' });
  });

  it('ignores an unknown log level', () => {
    expect(loadRuntimeConfig({ LOG_LEVEL: 'verbose' }).logLevel).toBe('INFO');
  });
});
