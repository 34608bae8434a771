import { LogLevel, Logger } from './utils/Logger';

export interface ServerConfig {
  port: number;
  frontendUrl: string;
  redisUrl: string;
  logLevel: LogLevel;
  checkpointIntervalMs: number;
  sessionTimeoutSeconds: number;
  snapshotTTLSeconds?: number;
}

function readInt(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Read server settings from the environment (after dotenv has populated it).
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const snapshotTTL = readInt(env.SNAPSHOT_TTL_SECONDS, 0, 'SNAPSHOT_TTL_SECONDS');

  return {
    port: readInt(env.PORT, 3001, 'PORT'),
    frontendUrl: env.FRONTEND_URL || 'http://localhost:3000',
    redisUrl: env.REDIS_URL || 'redis://localhost:6379',
    logLevel: Logger.parseLogLevel(env.LOG_LEVEL || 'info'),
    checkpointIntervalMs: readInt(env.CHECKPOINT_INTERVAL_MS, 30000, 'CHECKPOINT_INTERVAL_MS'),
    sessionTimeoutSeconds: readInt(env.SESSION_TIMEOUT_SECONDS, 3600, 'SESSION_TIMEOUT_SECONDS'),
    snapshotTTLSeconds: snapshotTTL > 0 ? snapshotTTL : undefined
  };
}
