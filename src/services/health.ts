import { Config } from '../config';
import { ListingStore } from '../types/store';
import { logger } from '../utils/logger';

export type HealthStatus = 'good' | 'recommended' | 'critical';

export interface HealthReport {
  status: HealthStatus;
  message: string;
  webhook: {
    enabled: boolean;
    path: string;
    secretConfigured: boolean;
    maskedSecret: string | null;
  };
  activeListings: number | null;
  timestamp: string;
}

/**
 * Masks all but the last 4 characters of the secret (at most 20 dots)
 */
export function maskSecret(secret: string): string {
  const hidden = Math.min(Math.max(secret.length - 4, 0), 20);
  return '•'.repeat(hidden) + secret.slice(-4);
}

/**
 * Reports whether the webhook is configured and ready to receive jobs
 */
export async function checkHealth(
  config: Config,
  store: Pick<ListingStore, 'countActive'>,
  now: Date = new Date()
): Promise<HealthReport> {
  const { secret, enabled, path } = config.webhook;
  const report: HealthReport = {
    status: 'good',
    message: 'Webhook is configured and ready to receive job data',
    webhook: {
      enabled,
      path,
      secretConfigured: secret.length > 0,
      maskedSecret: secret ? maskSecret(secret) : null,
    },
    activeListings: null,
    timestamp: now.toISOString(),
  };

  if (!secret) {
    return { ...report, status: 'critical', message: 'Missing webhook secret configuration (WEBHOOK_SECRET)' };
  }

  if (!enabled) {
    return { ...report, status: 'recommended', message: 'Webhook is configured but disabled (WEBHOOK_ENABLED)' };
  }

  let activeListings: number;
  try {
    activeListings = await store.countActive();
  } catch (error) {
    logger.error('Health check could not count listings', error);
    return { ...report, status: 'critical', message: 'Listing store unavailable' };
  }

  if (activeListings === 0) {
    return {
      ...report,
      status: 'recommended',
      message: 'Webhook is configured but no jobs have been synced yet',
      activeListings,
    };
  }

  return { ...report, activeListings };
}
