import { closePool } from '../db/client';
import { runMigration } from '../db/schema';
import { logger } from '../utils/logger';

/**
 * Applies the listing schema from the command line
 */
async function migrate(): Promise<number> {
  try {
    const report = await runMigration();
    if (report.missing.length > 0) {
      logger.error('Schema applied but tables are missing', undefined, { ...report });
      return 1;
    }
    logger.info('Listing schema is up to date', { tables: report.tables });
    return 0;
  } catch (error) {
    logger.error('Listing schema migration failed', error);
    return 1;
  } finally {
    await closePool();
  }
}

migrate()
  .then(code => process.exit(code))
  .catch((error: unknown) => {
    logger.error('Failed to close database pool', error);
    process.exit(1);
  });
