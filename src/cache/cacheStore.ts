import type { DateRange } from "../lib/dates";

export type CacheEntry<V> = {
  value: V;
  storedAt: number;
  ttlMs: number;
};

export type CacheStoreOptions = {
  ttlMs: number;
  now?: () => number;
};

export type SetOptions = {
  ttlMs?: number;
  storedAt?: number;
};

export type LoadOptions<V> = {
  shouldStore?: (value: V) => boolean;
  ttlMs?: (value: V) => number;
};

export const rangeKey = (range: DateRange): string => `${range.start}|${range.end}`;

/**
 * In-memory TTL store. Values are replaced by a single assignment once a load
 * has finished, so readers never observe a partially built value.
 */
export class CacheStore<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly pending = new Map<string, Promise<V>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: CacheStoreOptions) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  /** The live entry for a key; expired entries are evicted on read. */
  entry(key: string): CacheEntry<V> | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.now() - entry.storedAt >= entry.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  get(key: string): V | undefined {
    return this.entry(key)?.value;
  }

  set(key: string, value: V, options: SetOptions = {}): void {
    this.entries.set(key, {
      value,
      storedAt: options.storedAt ?? this.now(),
      ttlMs: options.ttlMs ?? this.ttlMs,
    });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  size(): number {
    return this.entries.size;
  }

  /**
   * Returns the cached value or runs `loader`. Concurrent callers for the same
   * key share one load. Nothing is stored when the loader throws or
   * `shouldStore` rejects the value.
   */
  getOrLoad(key: string, loader: () => Promise<V>, options: LoadOptions<V> = {}): Promise<V> {
    const cached = this.entry(key);
    if (cached) return Promise.resolve(cached.value);

    const inFlight = this.pending.get(key);
    if (inFlight) return inFlight;

    const load = loader()
      .then((value) => {
        const shouldStore = options.shouldStore ? options.shouldStore(value) : true;
        if (shouldStore) {
          this.set(key, value, { ttlMs: options.ttlMs ? options.ttlMs(value) : undefined });
        }
        return value;
      })
      .finally(() => {
        this.pending.delete(key);
      });
    this.pending.set(key, load);
    return load;
  }
}
