export type Clock = () => number;

/**
 * Backing key/value service with per-entry expiry. Implementations may be
 * remote, so every call is async.
 */
export interface ExpirableKeyValueStore {
  setWithExpire(key: string, value: string, ttlSeconds: number): Promise<void>;
  get(key: string): Promise<string | undefined>;
  delete(key: string): Promise<void>;
}

export interface MemoryExpirableStoreOptions {
  clock?: Clock;
}

type Entry = { value: string; expiresAt: number };

export class MemoryExpirableStore implements ExpirableKeyValueStore {
  private readonly map = new Map<string, Entry>();
  private readonly now: Clock;

  constructor(opts: MemoryExpirableStoreOptions = {}) {
    this.now = opts.clock ?? Date.now;
  }

  get size(): number {
    this.pruneExpired();
    return this.map.size;
  }

  async setWithExpire(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.map.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async get(key: string): Promise<string | undefined> {
    const e = this.map.get(key);
    if (!e) return undefined;
    if (this.now() >= e.expiresAt) {
      this.map.delete(key);
      return undefined;
    }
    return e.value;
  }

  async delete(key: string): Promise<void> {
    this.map.delete(key);
  }

  /** Expiry timestamp (ms) of a live entry. */
  expiresAt(key: string): number | undefined {
    const e = this.map.get(key);
    return e && this.now() < e.expiresAt ? e.expiresAt : undefined;
  }

  private pruneExpired(): void {
    const now = this.now();
    for (const [k, e] of this.map.entries()) {
      if (now >= e.expiresAt) this.map.delete(k);
    }
  }
}
