import type { VercelRequest, VercelResponse } from '@vercel/node';
import { runMigration } from '../src/db/schema';
import { logger } from '../src/utils/logger';

/**
 * Creates the listing and rate limit tables
 * POST only; secured with MIGRATION_SECRET, or CRON_SECRET when that is unset
 */
export default async function handler(
  req: VercelRequest,
  res: VercelResponse
): Promise<void> {
  const expectedSecret = process.env.MIGRATION_SECRET || process.env.CRON_SECRET;
  const authHeader = req.headers.authorization;

  if (expectedSecret && authHeader !== `Bearer ${expectedSecret}`) {
    logger.warn('Unauthorized migration request', { authHeader: authHeader ? 'present' : 'missing' });
    res.status(401).json({ error: 'Unauthorized' });
    return;
  }

  if (req.method !== 'POST') {
    res.setHeader('Allow', 'POST');
    res.status(405).json({ error: 'Method not allowed', allowed_methods: ['POST'] });
    return;
  }

  try {
    const report = await runMigration();

    if (report.missing.length > 0) {
      logger.error('Schema applied but tables are missing', undefined, { ...report });
      res.status(500).json({ success: false, ...report });
      return;
    }

    logger.info('Listing schema is up to date', { tables: report.tables });
    res.status(200).json({ success: true, ...report });
  } catch (error) {
    logger.error('Listing schema migration failed', error);
    res.status(500).json({ success: false, error: 'Migration failed' });
  }
}
