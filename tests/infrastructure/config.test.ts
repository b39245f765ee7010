import { describe, it, expect } from 'vitest';
import { loadCollectorConfig } from '../../src/infrastructure/config.js';

describe('loadCollectorConfig', () => {
  it('returns defaults for an empty environment', () => {
    expect(loadCollectorConfig({})).toEqual({
      host: '0.0.0.0',
      port: 3000,
      logLevel: 'info',
      redisUrl: 'redis://localhost:6379',
      streamKey: 'raw_events_stream',
      bodyLimit: 1_048_576,
    });
  });

  it('reads every variable', () => {
    const config = loadCollectorConfig({
      HOST: '127.0.0.1',
      PORT: '8080',
      LOG_LEVEL: 'debug',
      REDIS_URL: 'redis://cache.internal:6380',
      RAW_EVENTS_STREAM: 'collector:raw',
      BODY_LIMIT: '2048',
    });

    expect(config).toEqual({
      host: '127.0.0.1',
      port: 8080,
      logLevel: 'debug',
      redisUrl: 'redis://cache.internal:6380',
      streamKey: 'collector:raw',
      bodyLimit: 2048,
    });
  });

  it('throws on a non-numeric port', () => {
    expect(() => loadCollectorConfig({ PORT: 'abc' })).toThrow(/^Invalid collector configuration: PORT: /);
  });

  it('throws on an unknown log level', () => {
    expect(() => loadCollectorConfig({ LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL: /);
  });

  it('lists every invalid variable', () => {
    expect(() => loadCollectorConfig({ PORT: '-1', BODY_LIMIT: '0' })).toThrow(/PORT: .*; BODY_LIMIT: /);
  });
});
