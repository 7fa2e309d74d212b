import { CounterResult, CounterStore } from '../types/store';
import { getPool, SqlClient } from './client';

/**
 * PostgreSQL counter store for the webhook rate limiter.
 *
 * Check and increment happen in one upsert statement, so concurrent
 * requests for the same key serialize on the row lock. A rejected request
 * leaves the counter at `limit + 1`, which marks the window as exhausted.
 * Expired counters for other keys are deleted by the same statement; the
 * requesting key's own expired row is reset by the upsert instead.
 */
export class RateLimitRepository implements CounterStore {
  constructor(private readonly client?: SqlClient) {}

  async increment(key: string, limit: number, windowSeconds: number): Promise<CounterResult> {
    const result = await this.db().query(
      `WITH purged AS (
         DELETE FROM webhook_rate_limits
         WHERE expires_at <= NOW() AND key <> $1
       )
       INSERT INTO webhook_rate_limits (key, count, expires_at)
       VALUES ($1, 1, NOW() + make_interval(secs => $3::int))
       ON CONFLICT (key) DO UPDATE SET
         count = CASE
           WHEN webhook_rate_limits.expires_at <= NOW() THEN 1
           ELSE LEAST(webhook_rate_limits.count + 1, $2::int + 1)
         END,
         expires_at = CASE
           WHEN webhook_rate_limits.expires_at <= NOW() THEN EXCLUDED.expires_at
           ELSE webhook_rate_limits.expires_at
         END
       RETURNING count`,
      [key, limit, windowSeconds]
    );

    const count = Number(result.rows[0]?.count ?? 0);
    return { allowed: count >= 1 && count <= limit, count: Math.min(count, limit) };
  }

  private db(): SqlClient {
    return this.client ?? getPool();
  }
}
