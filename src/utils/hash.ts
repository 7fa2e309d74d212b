import { createHash } from 'crypto';

/**
 * Generates the rate limit counter key for a client address.
 * The address is hashed so raw IPs never reach the counter store.
 */
export function generateRateLimitKey(clientIp: string): string {
  const digest = createHash('sha256').update(clientIp.trim().toLowerCase()).digest('hex');
  return `rate:${digest}`;
}
