/**
 * Application configuration loaded from environment variables.
 *
 * Database settings live beside the pool in `utils/db.ts`.
 *
 * @module config
 */

import { isLogLevel, type LogLevel } from './logging/index.js';

export type NodeEnv = 'development' | 'test' | 'production';

export interface AppConfig {
  nodeEnv: NodeEnv;
  serviceName: string;
  httpHost: string;
  httpPort: number;
  logLevel: LogLevel;
  /** Undefined when JWT_SECRET is unset; token issue and verification then fail. */
  jwtSecret: string | undefined;
  accessTokenExpireMinutes: number;
  /** Seed the default role/permission catalog before accepting requests. */
  seedOnStartup: boolean;
}

function parseNodeEnv(value: string | undefined): NodeEnv {
  if (value === 'test' || value === 'production') return value;
  return 'development';
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const logLevel = env['LOG_LEVEL'] ?? 'info';
  const jwtSecret = env['JWT_SECRET'];
  return {
    nodeEnv: parseNodeEnv(env['NODE_ENV']),
    serviceName: env['SERVICE_NAME'] ?? 'rbac-core',
    httpHost: env['HTTP_HOST'] ?? '0.0.0.0',
    httpPort: parsePositiveInt(env['HTTP_PORT'], 8000),
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',
    jwtSecret: jwtSecret && jwtSecret.length > 0 ? jwtSecret : undefined,
    accessTokenExpireMinutes: parsePositiveInt(env['ACCESS_TOKEN_EXPIRE_MINUTES'], 30),
    seedOnStartup: env['RBAC_SEED_ON_STARTUP'] !== 'false',
  };
}
