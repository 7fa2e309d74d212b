import { IncomingListing, RecordId, ReconciliationResult } from '../types/listing';
import { ListingStore, ListingTransaction } from '../types/store';
import {
  isListingObject,
  normalizeListing,
  readExternalId,
  readTitle,
} from './listing-normalizer';
import { errorMessage, ReconciliationError, StoreUnavailableError } from './errors';
import { logger } from '../utils/logger';

/**
 * Observer callbacks invoked synchronously during reconciliation
 */
export interface ReconciliationHooks {
  onBeforeInsert?(job: IncomingListing): void;
  onBeforeUpdate?(job: IncomingListing, recordId: RecordId): void;
  onBeforeDelete?(recordId: RecordId, externalId: string): void;
  onAfterDelete?(recordId: RecordId, externalId: string): void;
}

export interface ReconciliationOptions {
  sourceTag: string;
  syncVersion: string;
  hooks?: ReconciliationHooks;
  clock?: () => Date;
}

interface UpsertSummary {
  processed: number;
  updated: number;
  skipped: number;
  errors: string[];
}

interface RemovalSummary {
  removed: number;
  removedJobIds: string[];
}

/**
 * Makes the listing store match an incoming snapshot.
 *
 * Creates and updates run in one transaction; stale deletion runs in a
 * second transaction after the first commits. A failure in the delete phase
 * does not undo committed creates and updates.
 */
export class ReconciliationEngine {
  private readonly hooks: ReconciliationHooks;
  private readonly clock: () => Date;

  constructor(
    private readonly store: ListingStore,
    private readonly options: ReconciliationOptions
  ) {
    this.hooks = options.hooks ?? {};
    this.clock = options.clock ?? (() => new Date());
  }

  async reconcile(listings: unknown[]): Promise<ReconciliationResult> {
    const summary = await this.upsertAll(listings);
    const removal = await this.removeStale(collectCurrentIds(listings));

    if (removal.removed > 0) {
      logger.debug(`Removed ${removal.removed} stale jobs`, {
        removed_job_ids: removal.removedJobIds,
      });
    }

    return {
      success: true,
      processed: summary.processed,
      updated: summary.updated,
      skipped: summary.skipped,
      total: listings.length,
      errors: summary.errors,
      removed: removal.removed,
      removed_job_ids: removal.removedJobIds,
      timestamp: this.clock().toISOString(),
      source: this.options.sourceTag,
    };
  }

  private async upsertAll(listings: unknown[]): Promise<UpsertSummary> {
    try {
      return await this.store.transaction(async (tx) => {
        const lookupIds = [...collectLookupIds(listings)];
        const existing = await tx.bulkLookupByExternalIds(lookupIds);
        const summary: UpsertSummary = { processed: 0, updated: 0, skipped: 0, errors: [] };

        for (const [index, job] of listings.entries()) {
          await this.upsertOne(tx, job, index, existing, summary);
        }

        return summary;
      });
    } catch (error) {
      logger.error('Listing upsert batch rolled back', error, { total: listings.length });
      throw new ReconciliationError('upsert', `Failed to store jobs: ${errorMessage(error)}`, error);
    }
  }

  private async upsertOne(
    tx: ListingTransaction,
    job: unknown,
    index: number,
    existing: Map<string, RecordId>,
    summary: UpsertSummary
  ): Promise<void> {
    if (!isListingObject(job)) {
      summary.skipped++;
      summary.errors.push(`Job at index ${index}: Invalid job data format`);
      return;
    }

    const externalId = readExternalId(job);
    const title = readTitle(job);
    if (!externalId || !title) {
      summary.skipped++;
      summary.errors.push(
        `Job '${externalId ?? 'unknown'}': Missing required fields: id and title are required`
      );
      return;
    }

    try {
      const listing = normalizeListing(job, externalId, title, {
        syncVersion: this.options.syncVersion,
        now: this.clock(),
      });

      const existingRecordId = existing.get(externalId);
      if (existingRecordId !== undefined) {
        this.hooks.onBeforeUpdate?.(job, existingRecordId);
        await tx.upsert(listing, existingRecordId);
        summary.updated++;
      } else {
        this.hooks.onBeforeInsert?.(job);
        const recordId = await tx.upsert(listing, null);
        // A repeated ID later in the same batch updates this record
        existing.set(externalId, recordId);
        summary.processed++;
      }
    } catch (error) {
      if (error instanceof StoreUnavailableError) throw error;
      summary.errors.push(`Job '${externalId}': ${errorMessage(error)}`);
    }
  }

  private async removeStale(currentIds: Set<string>): Promise<RemovalSummary> {
    try {
      return await this.store.transaction(async (tx) => {
        const active = await tx.bulkFetchAllActiveExternalIds();
        const removal: RemovalSummary = { removed: 0, removedJobIds: [] };

        for (const { recordId, externalId } of active) {
          if (currentIds.has(externalId)) continue;

          this.hooks.onBeforeDelete?.(recordId, externalId);
          if (await tx.hardDelete(recordId)) {
            removal.removed++;
            removal.removedJobIds.push(externalId);
            this.hooks.onAfterDelete?.(recordId, externalId);
          }
        }

        return removal;
      });
    } catch (error) {
      logger.error('Stale listing removal rolled back', error);
      throw new ReconciliationError(
        'delete',
        `Failed to remove stale jobs: ${errorMessage(error)}`,
        error
      );
    }
  }
}

/**
 * IDs used for the existing-record lookup: every readable ID in the batch
 */
function collectLookupIds(listings: unknown[]): Set<string> {
  const ids = new Set<string>();
  for (const job of listings) {
    if (!isListingObject(job)) continue;
    const externalId = readExternalId(job);
    if (externalId) ids.add(externalId);
  }
  return ids;
}

/**
 * IDs that survive stale deletion: jobs carrying both an ID and a title
 */
export function collectCurrentIds(listings: unknown[]): Set<string> {
  const ids = new Set<string>();
  for (const job of listings) {
    if (!isListingObject(job)) continue;
    const externalId = readExternalId(job);
    if (externalId && readTitle(job)) ids.add(externalId);
  }
  return ids;
}
