import type { VercelRequest, VercelResponse } from '@vercel/node';
import { loadConfig } from '../src/config';
import { ListingsRepository } from '../src/db/listings';
import { checkHealth } from '../src/services/health';
import { logger } from '../src/utils/logger';

/**
 * Webhook configuration health check
 * Secured with CRON_SECRET when set
 */
export default async function handler(
  req: VercelRequest,
  res: VercelResponse
): Promise<void> {
  const authHeader = req.headers.authorization;
  const cronSecret = process.env.CRON_SECRET;

  if (cronSecret && authHeader !== `Bearer ${cronSecret}`) {
    logger.warn('Unauthorized health request', { authHeader: authHeader ? 'present' : 'missing' });
    res.status(401).json({ error: 'Unauthorized' });
    return;
  }

  if (req.method !== 'GET') {
    res.status(405).json({ error: 'Method not allowed' });
    return;
  }

  const report = await checkHealth(loadConfig(), new ListingsRepository());
  res.status(report.status === 'critical' ? 503 : 200).json(report);
}
