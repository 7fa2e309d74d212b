import { ActiveListingRef, NormalizedListing, RecordId } from '../types/listing';
import { ListingStore, ListingTransaction } from '../types/store';
import { StoreUnavailableError } from '../services/errors';
import { getPool, SqlClient, SqlPool, SqlRow, withTransaction } from './client';
import { logger } from '../utils/logger';

function toRecordId(row: SqlRow): RecordId {
  const id = Number(row.id);
  if (!Number.isInteger(id)) {
    throw new Error(`Unexpected listing id: ${String(row.id)}`);
  }
  return id;
}

function listingParams(listing: NormalizedListing): unknown[] {
  return [
    listing.externalId,
    listing.title,
    listing.content,
    listing.excerpt,
    listing.department,
    listing.location,
    listing.jobType,
    listing.employmentType,
    listing.salaryRange,
    listing.applyUrl,
    listing.sourceUrl,
    listing.postedDate,
    listing.expiryDate,
    listing.publishedAt,
    listing.source,
    JSON.stringify(listing.rawData),
    listing.syncVersion,
    listing.lastUpdated,
  ];
}

/**
 * Transaction-scoped listing operations on a single pooled client
 */
export class PgListingTransaction implements ListingTransaction {
  private savepointCounter = 0;

  constructor(private readonly client: SqlClient) {}

  async bulkLookupByExternalIds(externalIds: string[]): Promise<Map<string, RecordId>> {
    const map = new Map<string, RecordId>();
    if (externalIds.length === 0) return map;

    const result = await this.client.query(
      `SELECT id, external_id
       FROM job_listings
       WHERE external_id = ANY($1::text[])
         AND status <> 'trash'`,
      [externalIds]
    );

    for (const row of result.rows) {
      map.set(String(row.external_id), toRecordId(row));
    }
    return map;
  }

  /**
   * Writes one listing under a savepoint, so a failing statement only
   * discards this listing and the surrounding batch transaction stays usable
   */
  async upsert(listing: NormalizedListing, existingRecordId: RecordId | null): Promise<RecordId> {
    const savepoint = `listing_${++this.savepointCounter}`;
    await this.client.query(`SAVEPOINT ${savepoint}`);

    try {
      const recordId = existingRecordId === null
        ? await this.insert(listing)
        : await this.update(listing, existingRecordId);
      await this.client.query(`RELEASE SAVEPOINT ${savepoint}`);
      return recordId;
    } catch (error) {
      try {
        await this.client.query(`ROLLBACK TO SAVEPOINT ${savepoint}`);
      } catch (rollbackError) {
        throw new StoreUnavailableError('Listing transaction is no longer usable', rollbackError);
      }
      logger.error('Error writing listing', error, { externalId: listing.externalId });
      throw error;
    }
  }

  async bulkFetchAllActiveExternalIds(): Promise<ActiveListingRef[]> {
    const result = await this.client.query(
      `SELECT id, external_id
       FROM job_listings
       WHERE status <> 'trash'
       ORDER BY id`
    );

    return result.rows.map(row => ({
      recordId: toRecordId(row),
      externalId: String(row.external_id),
    }));
  }

  async hardDelete(recordId: RecordId): Promise<boolean> {
    const result = await this.client.query(
      'DELETE FROM job_listings WHERE id = $1',
      [recordId]
    );
    return (result.rowCount ?? 0) > 0;
  }

  private async insert(listing: NormalizedListing): Promise<RecordId> {
    const result = await this.client.query(
      `INSERT INTO job_listings (
        external_id, title, content, excerpt, department, location, job_type,
        employment_type, salary_range, apply_url, source_url, posted_date,
        expiry_date, published_at, source, raw_data, sync_version, last_updated,
        status
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18, 'publish')
      RETURNING id`,
      listingParams(listing)
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error('Insert returned no listing id');
    }
    return toRecordId(row);
  }

  private async update(listing: NormalizedListing, recordId: RecordId): Promise<RecordId> {
    const result = await this.client.query(
      `UPDATE job_listings SET
        external_id = $1, title = $2, content = $3, excerpt = $4, department = $5,
        location = $6, job_type = $7, employment_type = $8, salary_range = $9,
        apply_url = $10, source_url = $11, posted_date = $12, expiry_date = $13,
        published_at = $14, source = $15, raw_data = $16, sync_version = $17,
        last_updated = $18, status = 'publish', updated_at = NOW()
      WHERE id = $19
      RETURNING id`,
      [...listingParams(listing), recordId]
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error(`Listing record ${recordId} no longer exists`);
    }
    return toRecordId(row);
  }
}

/**
 * PostgreSQL-backed listing store
 */
export class ListingsRepository implements ListingStore {
  constructor(private readonly pool?: SqlPool) {}

  transaction<T>(work: (tx: ListingTransaction) => Promise<T>): Promise<T> {
    return withTransaction(client => work(new PgListingTransaction(client)), this.db());
  }

  async countActive(): Promise<number> {
    const result = await this.db().query(
      `SELECT COUNT(*) AS total FROM job_listings WHERE status <> 'trash'`
    );
    return Number(result.rows[0]?.total ?? 0);
  }

  private db(): SqlPool {
    return this.pool ?? getPool();
  }
}
