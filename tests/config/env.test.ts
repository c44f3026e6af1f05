import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../src/config/env';

describe('loadConfig', () => {
  it('fills in defaults', () => {
    expect(loadConfig({ NODE_ENV: 'test' })).toEqual({
      NODE_ENV: 'test',
      PORT: 5000,
      MONGODB_URI: 'mongodb://localhost:27017',
      DATABASE_NAME: 'drone_alerts_db',
      WS_PATH: '/ws/events',
      CORS_ORIGIN: '*',
      SNAPSHOT_SIZE: 50,
      CHANGE_FEED_RETRY_MS: 3000,
      CHANGE_FEED_MAX_RETRY_MS: 30000,
      SHUTDOWN_TIMEOUT_MS: 10000,
    });
  });

  it('coerces numeric variables', () => {
    const config = loadConfig({ NODE_ENV: 'production', PORT: '8080', SNAPSHOT_SIZE: '10' });

    expect(config.PORT).toBe(8080);
    expect(config.SNAPSHOT_SIZE).toBe(10);
  });

  it('treats empty values as unset', () => {
    const config = loadConfig({ NODE_ENV: 'development', PORT: '', DATABASE_NAME: '' });

    expect(config.PORT).toBe(5000);
    expect(config.DATABASE_NAME).toBe('drone_alerts_db');
  });

  it('requires NODE_ENV', () => {
    expect(() => loadConfig({})).toThrow('Invalid configuration:\n  - NODE_ENV: NODE_ENV is not defined!');
  });

  it('lists every invalid variable', () => {
    expect(() => loadConfig({ NODE_ENV: 'test', PORT: 'eighty', WS_PATH: 'ws', SNAPSHOT_SIZE: '500' })).toThrow(
      /PORT: [\s\S]*WS_PATH: [\s\S]*SNAPSHOT_SIZE: /
    );
  });

  it('rejects a retry cap below the initial retry delay', () => {
    expect(() =>
      loadConfig({ NODE_ENV: 'test', CHANGE_FEED_RETRY_MS: '5000', CHANGE_FEED_MAX_RETRY_MS: '1000' })
    ).toThrow('  - CHANGE_FEED_MAX_RETRY_MS: CHANGE_FEED_MAX_RETRY_MS must not be lower than CHANGE_FEED_RETRY_MS');
  });
});
