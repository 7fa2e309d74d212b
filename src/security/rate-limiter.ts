import { CounterStore } from '../types/store';
import { generateRateLimitKey } from '../utils/hash';
import { logger } from '../utils/logger';

export const DEFAULT_RATE_LIMIT_MAX_REQUESTS = 10;
export const DEFAULT_RATE_LIMIT_WINDOW_SECONDS = 60;

/**
 * Fixed-window rate limiter keyed by client IP
 */
export class RateLimiter {
  constructor(private readonly store: CounterStore) {}

  /**
   * Counts a request for the client and reports whether it is within the
   * limit. Rejected requests do not advance the counter.
   */
  async allow(
    clientKey: string,
    maxRequests: number = DEFAULT_RATE_LIMIT_MAX_REQUESTS,
    windowSeconds: number = DEFAULT_RATE_LIMIT_WINDOW_SECONDS
  ): Promise<boolean> {
    const { allowed, count } = await this.store.increment(
      generateRateLimitKey(clientKey),
      maxRequests,
      windowSeconds
    );

    if (!allowed) {
      logger.debug('Rate limit reached', { count, maxRequests, windowSeconds });
    }
    return allowed;
  }
}
