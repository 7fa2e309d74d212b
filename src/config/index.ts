/**
 * Configuration management
 * All behavior is driven by environment variables
 */

export const DEFAULT_WEBHOOK_PATH = '/webhook/drivehr-sync';
export const DEFAULT_SOURCE_TAG = 'drivehr-netlify-sync';
export const DEFAULT_SYNC_VERSION = '1.0.0';

export type RateLimitStoreKind = 'postgres' | 'memory';

export interface Config {
  // Webhook
  webhook: {
    secret: string;
    enabled: boolean;
    path: string;
    maxJobsPerRequest: number;
    maxTimestampDriftSeconds: number;
    sourceTag: string;
    syncVersion: string;
  };

  // Rate Limiting
  rateLimit: {
    maxRequests: number;
    windowSeconds: number;
    store: RateLimitStoreKind;
  };

  // Diagnostics
  debug: boolean;

  // Standalone server
  port: number;
}

function parseBoolean(value: string | undefined, defaultValue: boolean = false): boolean {
  if (!value) return defaultValue;
  const normalized = value.trim().toLowerCase();
  return normalized === 'true' || normalized === '1';
}

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed <= 0 ? defaultValue : parsed;
}

function parseStoreKind(value: string | undefined): RateLimitStoreKind {
  return value?.trim().toLowerCase() === 'memory' ? 'memory' : 'postgres';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    webhook: {
      // An empty secret is kept as-is: the verifier rejects every request
      secret: env.WEBHOOK_SECRET?.trim() ?? '',
      enabled: parseBoolean(env.WEBHOOK_ENABLED, false),
      path: env.WEBHOOK_PATH?.trim() || DEFAULT_WEBHOOK_PATH,
      maxJobsPerRequest: parseNumber(env.MAX_JOBS_PER_REQUEST, 100),
      maxTimestampDriftSeconds: parseNumber(env.MAX_TIMESTAMP_DRIFT_SECONDS, 300),
      sourceTag: env.SYNC_SOURCE_TAG?.trim() || DEFAULT_SOURCE_TAG,
      syncVersion: env.SYNC_VERSION?.trim() || DEFAULT_SYNC_VERSION,
    },
    rateLimit: {
      maxRequests: parseNumber(env.RATE_LIMIT_MAX_REQUESTS, 10),
      windowSeconds: parseNumber(env.RATE_LIMIT_WINDOW_SECONDS, 60),
      store: parseStoreKind(env.RATE_LIMIT_STORE),
    },
    debug: parseBoolean(env.WEBHOOK_DEBUG, false),
    port: parseNumber(env.PORT, 3000),
  };
}
