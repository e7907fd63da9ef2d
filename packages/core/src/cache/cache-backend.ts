/**
 * Minimal key/value contract the cache layer, the invalidation registry and
 * the rate limiter need from a shared backend. Values are opaque strings.
 */
export interface CacheBackend {
  readonly name: string;

  get(key: string): Promise<string | null>;

  /** `ttlMs` null stores the entry without expiry */
  set(key: string, value: string, ttlMs: number | null): Promise<void>;

  delete(keys: readonly string[]): Promise<void>;

  /**
   * Atomically add one to an integer counter and return the new value.
   * A missing or expired counter starts at 1; the TTL is applied only when the
   * counter is (re)created, so a fixed window never slides.
   */
  increment(key: string, ttlMs: number | null): Promise<number>;

  addToSet(key: string, member: string): Promise<void>;

  /** A missing set reads as empty */
  getSet(key: string): Promise<string[]>;

  removeFromSet(key: string, members: readonly string[]): Promise<void>;

  ping(): Promise<void>;

  close(): Promise<void>;
}

export interface ExpiringEntry {
  value: string;
  expiresAt: number | null;
}

export function expiryFrom(now: number, ttlMs: number | null): number | null {
  return ttlMs !== null && ttlMs > 0 ? now + ttlMs : null;
}

export function isExpired(entry: ExpiringEntry, now: number): boolean {
  return entry.expiresAt !== null && entry.expiresAt <= now;
}
