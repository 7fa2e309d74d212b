import { Config, loadConfig } from '../config';
import { ListingsRepository } from '../db/listings';
import { RateLimitRepository } from '../db/rate-limits';
import { MemoryCounterStore } from '../security/memory-counter-store';
import { RateLimiter } from '../security/rate-limiter';
import { CounterStore, ListingStore } from '../types/store';
import { PayloadValidator } from '../validation/payload-validator';
import { setDebugLogging } from '../utils/logger';
import { ReconciliationEngine, ReconciliationHooks } from './reconciliation';
import { WebhookEndpoint, WebhookHooks } from './webhook-endpoint';

export interface WebhookEndpointOverrides {
  listingStore?: ListingStore;
  counterStore?: CounterStore;
  reconciliationHooks?: ReconciliationHooks;
  webhookHooks?: WebhookHooks;
  clock?: () => Date;
}

export function createCounterStore(config: Config): CounterStore {
  return config.rateLimit.store === 'memory'
    ? new MemoryCounterStore()
    : new RateLimitRepository();
}

/**
 * Wires the webhook pipeline from configuration
 */
export function createWebhookEndpoint(
  config: Config,
  overrides: WebhookEndpointOverrides = {}
): WebhookEndpoint {
  setDebugLogging(config.debug);

  const listingStore = overrides.listingStore ?? new ListingsRepository();
  const counterStore = overrides.counterStore ?? createCounterStore(config);

  const engine = new ReconciliationEngine(listingStore, {
    sourceTag: config.webhook.sourceTag,
    syncVersion: config.webhook.syncVersion,
    hooks: overrides.reconciliationHooks,
    clock: overrides.clock,
  });

  return new WebhookEndpoint({
    settings: {
      path: config.webhook.path,
      enabled: config.webhook.enabled,
      secret: config.webhook.secret,
      maxTimestampDriftSeconds: config.webhook.maxTimestampDriftSeconds,
      rateLimit: {
        maxRequests: config.rateLimit.maxRequests,
        windowSeconds: config.rateLimit.windowSeconds,
      },
    },
    rateLimiter: new RateLimiter(counterStore),
    validator: new PayloadValidator(config.webhook.maxJobsPerRequest),
    engine,
    hooks: overrides.webhookHooks,
    clock: overrides.clock,
  });
}

let endpoint: WebhookEndpoint | null = null;

/**
 * Process-wide endpoint instance, created on first use.
 * Warm serverless invocations reuse it, including its in-memory counters.
 */
export function getWebhookEndpoint(): WebhookEndpoint {
  if (!endpoint) {
    endpoint = createWebhookEndpoint(loadConfig());
  }
  return endpoint;
}
