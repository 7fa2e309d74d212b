import { CounterResult, CounterStore } from '../types/store';

interface CounterEntry {
  count: number;
  expiresAt: number;
}

export interface MemoryCounterStoreOptions {
  /** Clock in milliseconds */
  now?: () => number;
  /** Entry count above which expired counters are swept */
  maxEntries?: number;
}

/**
 * In-process counter store for single-instance deployments.
 * `increment` runs synchronously, so it is atomic within the process.
 */
export class MemoryCounterStore implements CounterStore {
  private readonly counters = new Map<string, CounterEntry>();
  private readonly now: () => number;
  private readonly maxEntries: number;

  constructor(options: MemoryCounterStoreOptions = {}) {
    this.now = options.now ?? Date.now;
    this.maxEntries = options.maxEntries ?? 10_000;
  }

  increment(key: string, limit: number, windowSeconds: number): Promise<CounterResult> {
    const now = this.now();
    const entry = this.counters.get(key);

    if (!entry || entry.expiresAt <= now) {
      if (this.counters.size >= this.maxEntries) this.sweep(now);
      this.counters.set(key, { count: 1, expiresAt: now + windowSeconds * 1000 });
      return Promise.resolve({ allowed: true, count: 1 });
    }

    if (entry.count >= limit) {
      return Promise.resolve({ allowed: false, count: entry.count });
    }

    entry.count++;
    return Promise.resolve({ allowed: true, count: entry.count });
  }

  get size(): number {
    return this.counters.size;
  }

  private sweep(now: number): void {
    for (const [key, entry] of this.counters) {
      if (entry.expiresAt <= now) this.counters.delete(key);
    }
  }
}
