import { loadConfig } from '../config';
import { LogLevel } from '../utils/Logger';

describe('loadConfig', () => {
  it('should fall back to defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 3001,
      frontendUrl: 'http://localhost:3000',
      redisUrl: 'redis://localhost:6379',
      logLevel: LogLevel.INFO,
      checkpointIntervalMs: 30000,
      sessionTimeoutSeconds: 3600,
      snapshotTTLSeconds: undefined
    });
  });

  it('should read settings from the environment', () => {
    const config = loadConfig({
      PORT: '4000',
      FRONTEND_URL: 'https://editor.example.test',
      REDIS_URL: 'redis://cache:6380',
      LOG_LEVEL: 'debug',
      CHECKPOINT_INTERVAL_MS: '5000',
      SESSION_TIMEOUT_SECONDS: '60',
      SNAPSHOT_TTL_SECONDS: '86400'
    });

    expect(config).toEqual({
      port: 4000,
      frontendUrl: 'https://editor.example.test',
      redisUrl: 'redis://cache:6380',
      logLevel: LogLevel.DEBUG,
      checkpointIntervalMs: 5000,
      sessionTimeoutSeconds: 60,
      snapshotTTLSeconds: 86400
    });
  });

  it('should treat a zero TTL as no expiry', () => {
    expect(loadConfig({ SNAPSHOT_TTL_SECONDS: '0' }).snapshotTTLSeconds).toBeUndefined();
  });

  it('should ignore blank values', () => {
    expect(loadConfig({ PORT: '  ' }).port).toBe(3001);
  });

  it.each([
    ['PORT', 'abc'],
    ['CHECKPOINT_INTERVAL_MS', '-5'],
    ['SESSION_TIMEOUT_SECONDS', '1.5']
  ])('should refuse an invalid %s', (name, value) => {
    expect(() => loadConfig({ [name]: value })).toThrow(`${name} must be a non-negative integer, got "${value}"`);
  });
});
