export type ReconciliationPhase = 'upsert' | 'delete';

/**
 * A failure of the listing store as a whole (connection lost, transaction
 * state unrecoverable), as opposed to a failure writing one listing.
 * Aborts the batch when thrown from a per-item store call.
 */
export class StoreUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StoreUnavailableError';
  }
}

/**
 * Batch-level reconciliation failure. The phase's transaction has been
 * rolled back when this is thrown.
 */
export class ReconciliationError extends Error {
  constructor(
    readonly phase: ReconciliationPhase,
    message: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'ReconciliationError';
  }
}

/**
 * Request body over the accepted size
 */
export class PayloadTooLargeError extends Error {
  constructor(readonly limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = 'PayloadTooLargeError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
