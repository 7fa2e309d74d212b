import { ActiveListingRef, NormalizedListing, RecordId, StoredListing } from '../types/listing';
import { ListingStore, ListingTransaction } from '../types/store';

export interface InMemoryFailures {
  /** Fail the commit of the next transaction */
  commit?: boolean;
  /** Fail upserts for these external IDs */
  upsertIds?: Set<string>;
  /** Throw this error from every upsert (e.g. a StoreUnavailableError) */
  upsertError?: Error;
  /** Fail the lookup of existing listings */
  lookup?: boolean;
  /** Fail deletes of these external IDs */
  deleteIds?: Set<string>;
}

function cloneRow(row: StoredListing): StoredListing {
  return {
    ...row,
    rawData: structuredClone(row.rawData),
    publishedAt: new Date(row.publishedAt.getTime()),
    lastUpdated: new Date(row.lastUpdated.getTime()),
  };
}

/**
 * Listing store held in memory. Transactions work on a copy of the rows
 * that replaces the committed state only when the work resolves.
 */
export class InMemoryListingStore implements ListingStore {
  private rows = new Map<RecordId, StoredListing>();
  private nextId = 1;
  readonly failures: InMemoryFailures = {};
  transactions = 0;

  async transaction<T>(work: (tx: ListingTransaction) => Promise<T>): Promise<T> {
    this.transactions++;
    const working = new Map<RecordId, StoredListing>();
    for (const [id, row] of this.rows) working.set(id, cloneRow(row));
    const startingId = this.nextId;

    try {
      const result = await work(new InMemoryTransaction(this, working));
      if (this.failures.commit) {
        this.failures.commit = false;
        throw new Error('commit failed');
      }
      this.rows = working;
      return result;
    } catch (error) {
      this.nextId = startingId;
      throw error;
    }
  }

  async countActive(): Promise<number> {
    return this.active().length;
  }

  /**
   * Adds a committed row directly, bypassing transactions
   */
  seed(externalId: string, overrides: Partial<StoredListing> = {}): StoredListing {
    const now = new Date('2024-01-01T00:00:00.000Z');
    const row: StoredListing = {
      id: this.allocateId(),
      status: 'publish',
      externalId,
      title: `Listing ${externalId}`,
      content: '',
      excerpt: '',
      department: '',
      location: '',
      jobType: '',
      employmentType: '',
      salaryRange: '',
      applyUrl: '',
      postedDate: '',
      expiryDate: '',
      sourceUrl: '',
      publishedAt: now,
      source: 'drivehr',
      rawData: { id: externalId },
      syncVersion: '0.9.0',
      lastUpdated: now,
      ...overrides,
    };
    this.rows.set(row.id, row);
    return row;
  }

  all(): StoredListing[] {
    return [...this.rows.values()].map(cloneRow);
  }

  active(): StoredListing[] {
    return this.all().filter(row => row.status !== 'trash');
  }

  activeExternalIds(): string[] {
    return this.active().map(row => row.externalId).sort();
  }

  findByExternalId(externalId: string): StoredListing | undefined {
    return this.active().find(row => row.externalId === externalId);
  }

  allocateId(): RecordId {
    return this.nextId++;
  }
}

class InMemoryTransaction implements ListingTransaction {
  constructor(
    private readonly store: InMemoryListingStore,
    private readonly rows: Map<RecordId, StoredListing>
  ) {}

  async bulkLookupByExternalIds(externalIds: string[]): Promise<Map<string, RecordId>> {
    if (this.store.failures.lookup) {
      throw new Error('lookup failed');
    }
    const wanted = new Set(externalIds);
    const map = new Map<string, RecordId>();
    for (const row of this.rows.values()) {
      if (row.status !== 'trash' && wanted.has(row.externalId)) {
        map.set(row.externalId, row.id);
      }
    }
    return map;
  }

  async upsert(listing: NormalizedListing, existingRecordId: RecordId | null): Promise<RecordId> {
    const { upsertError, upsertIds } = this.store.failures;
    if (upsertError) throw upsertError;
    if (upsertIds?.has(listing.externalId)) {
      throw new Error('write rejected');
    }

    if (existingRecordId !== null) {
      if (!this.rows.has(existingRecordId)) {
        throw new Error(`Listing record ${existingRecordId} no longer exists`);
      }
      this.rows.set(existingRecordId, { ...listing, id: existingRecordId, status: 'publish' });
      return existingRecordId;
    }

    const id = this.store.allocateId();
    this.rows.set(id, { ...listing, id, status: 'publish' });
    return id;
  }

  async bulkFetchAllActiveExternalIds(): Promise<ActiveListingRef[]> {
    return [...this.rows.values()]
      .filter(row => row.status !== 'trash')
      .sort((a, b) => a.id - b.id)
      .map(row => ({ recordId: row.id, externalId: row.externalId }));
  }

  async hardDelete(recordId: RecordId): Promise<boolean> {
    const row = this.rows.get(recordId);
    if (!row) return false;
    if (this.store.failures.deleteIds?.has(row.externalId)) {
      throw new Error('delete rejected');
    }
    return this.rows.delete(recordId);
  }
}
