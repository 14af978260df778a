/**
 * Shared Application Configuration
 *
 * Centralizes all environment variable access for the webhook receiver,
 * sync workers and the maintenance scheduler. Relation/field identifiers
 * live in src/sync/config.ts.
 *
 * Environment variables:
 * - AUTOMATION_KILL_SWITCH: Set to 'true' to disable all sync processing
 * - REDIS_URL / REDIS_HOST / REDIS_PORT / REDIS_PASSWORD: Redis connection
 * - B24_DOMAIN: Bitrix24 portal domain (required)
 * - B24_REQUEST_TIMEOUT_MS: Per-request timeout for REST calls (default 30s)
 * - B24_APPLICATION_TOKEN: Optional token Bitrix24 sends with outbound events
 * - B24_CLIENT_ID / B24_CLIENT_SECRET: OAuth app credentials for token refresh
 * - SYNC_CONCURRENCY / SYNC_RATE_LIMIT_*: Worker backpressure
 * - DAILY_SYNC_*: Daily full-sync schedule
 * - PORT: HTTP server port (default 3000)
 */

import 'dotenv/config';

export interface AppConfig {
  isDev: boolean;
  killSwitch: boolean;
  redis: {
    url: string | undefined;
    host: string;
    port: number;
    password: string | undefined;
  };
  bitrix: {
    domain: string;
    requestTimeoutMs: number;
    applicationToken: string | undefined;
  };
  oauth: {
    clientId: string;
    clientSecret: string;
    tokenUrl: string;
    refreshIntervalMs: number;
  };
  sync: {
    concurrency: number;
    rateLimitMax: number;
    rateLimitDurationMs: number;
    dailyEnabled: boolean;
    dailyCron: string;
    dailyTimezone: string;
  };
  server: {
    port: number;
  };
}

function requiredEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(
      `Missing required environment variable: ${key}. ` +
      `Copy .env.example to .env and fill in the required values.`
    );
  }
  return value;
}

function optionalEnv(key: string, fallback = ''): string {
  return process.env[key] ?? fallback;
}

function intEnv(key: string, fallback: number): number {
  const parsed = parseInt(optionalEnv(key, String(fallback)), 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

const isDev = (optionalEnv('APP_ENV', 'development')) !== 'production';

export const appConfig: AppConfig = {
  isDev,
  killSwitch: process.env.AUTOMATION_KILL_SWITCH === 'true',
  redis: {
    url: process.env.REDIS_URL ?? undefined,
    host: optionalEnv('REDIS_HOST', 'localhost'),
    port: intEnv('REDIS_PORT', 6379),
    password: process.env.REDIS_PASSWORD ?? undefined,
  },
  bitrix: {
    domain: requiredEnv('B24_DOMAIN'),
    requestTimeoutMs: intEnv('B24_REQUEST_TIMEOUT_MS', 30_000),
    applicationToken: process.env.B24_APPLICATION_TOKEN || undefined,
  },
  oauth: {
    clientId: optionalEnv('B24_CLIENT_ID'),
    clientSecret: optionalEnv('B24_CLIENT_SECRET'),
    tokenUrl: optionalEnv('B24_OAUTH_URL', 'https://oauth.bitrix.info/oauth/token/'),
    refreshIntervalMs: intEnv('TOKEN_REFRESH_INTERVAL_MS', 30 * 60 * 1000),
  },
  sync: {
    concurrency: intEnv('SYNC_CONCURRENCY', 5),
    rateLimitMax: intEnv('SYNC_RATE_LIMIT_MAX', 2),
    rateLimitDurationMs: intEnv('SYNC_RATE_LIMIT_DURATION_MS', 1000),
    dailyEnabled: optionalEnv('DAILY_SYNC_ENABLED', 'true') !== 'false',
    dailyCron: optionalEnv('DAILY_SYNC_CRON', '0 3 * * *'),
    dailyTimezone: optionalEnv('DAILY_SYNC_TZ', 'Europe/Warsaw'),
  },
  server: {
    port: intEnv('PORT', 3000),
  },
};
