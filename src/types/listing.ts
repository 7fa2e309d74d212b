/**
 * Listing schemas shared by the webhook, the reconciliation engine and the store
 */

/**
 * Internal record ID assigned by the listing store
 */
export type RecordId = number;

/**
 * A decoded job object from the webhook payload, before validation.
 * Field names arrive in both camelCase and snake_case.
 */
export type IncomingListing = Record<string, unknown>;

export type ListingStatus = 'publish' | 'trash';

/**
 * Sanitized listing ready to be written to the store
 */
export interface NormalizedListing {
  externalId: string;
  title: string;
  content: string;
  excerpt: string;
  department: string;
  location: string;
  jobType: string;
  employmentType: string;
  salaryRange: string;
  applyUrl: string;
  postedDate: string;
  expiryDate: string;
  sourceUrl: string;
  publishedAt: Date;
  source: string;
  /** Incoming fields minus the description, kept for audit */
  rawData: Record<string, unknown>;
  syncVersion: string;
  lastUpdated: Date;
}

/**
 * Listing as persisted, keyed by its internal record ID
 */
export interface StoredListing extends NormalizedListing {
  id: RecordId;
  status: ListingStatus;
}

export interface ActiveListingRef {
  recordId: RecordId;
  externalId: string;
}

/**
 * Summary of one reconciliation run, returned as the webhook response body
 */
export interface ReconciliationResult {
  success: true;
  /** Listings created */
  processed: number;
  updated: number;
  skipped: number;
  total: number;
  errors: string[];
  removed: number;
  removed_job_ids: string[];
  timestamp: string;
  source: string;
}
