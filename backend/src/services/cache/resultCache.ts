import type { AttemptStatus } from '../../types/bypass';

export type CachedOutcome = Extract<AttemptStatus, 'Success' | 'Failed' | 'Error'>;

export interface CachedResult {
  outcome: CachedOutcome;
  recordedAt: number;
}

/**
 * Last terminal outcome per serial and method. Only a ranking hint.
 */
export interface ResultCache {
  get(serial: string, methodName: string): CachedResult | undefined;
  record(serial: string, methodName: string, outcome: CachedOutcome): void;
}

export interface MemoryResultCacheOptions {
  ttlMs: number;
  maxEntries: number;
  now?: () => number;
}

export class MemoryResultCache implements ResultCache {
  private readonly entries = new Map<string, CachedResult>();
  private readonly now: () => number;

  constructor(private readonly options: MemoryResultCacheOptions) {
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  get(serial: string, methodName: string): CachedResult | undefined {
    const key = cacheKey(serial, methodName);
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.now() - entry.recordedAt >= this.options.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  record(serial: string, methodName: string, outcome: CachedOutcome): void {
    const key = cacheKey(serial, methodName);
    // Re-insert so Map order tracks recency
    this.entries.delete(key);
    this.entries.set(key, { outcome, recordedAt: this.now() });

    while (this.entries.size > this.options.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }
}

const cacheKey = (serial: string, methodName: string): string => `${serial}\u0000${methodName}`;
