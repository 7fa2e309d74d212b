import { ActiveListingRef, NormalizedListing, RecordId } from './listing';

/**
 * Operations available inside a listing store transaction
 */
export interface ListingTransaction {
  /**
   * Maps each external ID that already exists (and is not trashed) to its record ID
   */
  bulkLookupByExternalIds(externalIds: string[]): Promise<Map<string, RecordId>>;

  /**
   * Creates a record, or overwrites the record `existingRecordId` in place
   */
  upsert(listing: NormalizedListing, existingRecordId: RecordId | null): Promise<RecordId>;

  bulkFetchAllActiveExternalIds(): Promise<ActiveListingRef[]>;

  /**
   * Permanently deletes a record. Returns false if nothing was deleted.
   */
  hardDelete(recordId: RecordId): Promise<boolean>;
}

/**
 * Persistent storage of job listings keyed by external job ID.
 *
 * `transaction` commits when `work` resolves and rolls back when it rejects.
 */
export interface ListingStore {
  transaction<T>(work: (tx: ListingTransaction) => Promise<T>): Promise<T>;
  countActive(): Promise<number>;
}

export interface CounterResult {
  allowed: boolean;
  count: number;
}

/**
 * Expiring counter store used by the rate limiter.
 * `increment` must check and increment atomically per key.
 */
export interface CounterStore {
  increment(key: string, limit: number, windowSeconds: number): Promise<CounterResult>;
}
