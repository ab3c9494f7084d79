/**
 * Cache backend abstraction.
 *
 * The dispatch layer only needs `get` and `set` with a TTL. Backends are
 * expected to be safe for concurrent use; their failures are handled by the
 * cache dispatch wrapper and never reach callers.
 */

export interface CacheAdapter {
  /**
   * Read a stored value, `undefined` on a miss or after expiry.
   */
  get(key: string): Promise<Uint8Array | undefined>;

  /**
   * Store a value for `ttlSeconds`.
   */
  set(key: string, value: Uint8Array, ttlSeconds: number): Promise<void>;
}

interface StoredEntry {
  value: Uint8Array;
  expiresAt: number;
}

export interface InMemoryCacheAdapterOptions {
  /** Clock in milliseconds, injectable for tests */
  now?: () => number;

  /** Maximum number of entries; the oldest entry is evicted first */
  maxEntries?: number;
}

/**
 * In-process cache backend.
 *
 * Expired entries are dropped lazily on read, and the oldest entries are
 * evicted once `maxEntries` is reached.
 *
 * @example
 * ```typescript
 * const cache = new InMemoryCacheAdapter({ maxEntries: 1000 });
 * await cache.set('key', new TextEncoder().encode('value'), 60);
 * ```
 */
export class InMemoryCacheAdapter implements CacheAdapter {
  private readonly entries: Map<string, StoredEntry> = new Map();
  private readonly now: () => number;
  private readonly maxEntries: number;

  constructor(options: InMemoryCacheAdapterOptions = {}) {
    this.now = options.now ?? Date.now;
    this.maxEntries = options.maxEntries ?? 10000;
  }

  async get(key: string): Promise<Uint8Array | undefined> {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  async set(key: string, value: Uint8Array, ttlSeconds: number): Promise<void> {
    this.entries.delete(key);
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  /**
   * Number of stored entries, including expired ones not yet read.
   */
  get size(): number {
    return this.entries.size;
  }

  /**
   * Stored keys, mostly for tests.
   */
  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  clear(): void {
    this.entries.clear();
  }
}
