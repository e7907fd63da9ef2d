import type { CacheBackend, ExpiringEntry } from './cache-backend.js';
import { expiryFrom, isExpired } from './cache-backend.js';

export interface MemoryCacheOptions {
  /** Clock override for tests */
  now?: () => number;
  /** Expired entries are swept at most this often (ms) */
  sweepIntervalMs?: number;
}

/**
 * In-process backend. State is private to one process, so it only suits a
 * single worker (development, tests).
 */
export class MemoryCacheBackend implements CacheBackend {
  readonly name = 'memory';
  private readonly entries = new Map<string, ExpiringEntry>();
  private readonly sets = new Map<string, Set<string>>();
  private readonly now: () => number;
  private readonly sweepIntervalMs: number;
  private lastSweep = 0;
  private closed = false;

  constructor(options: MemoryCacheOptions = {}) {
    this.now = options.now ?? Date.now;
    this.sweepIntervalMs = options.sweepIntervalMs ?? 60_000;
  }

  get size(): number {
    return this.entries.size;
  }

  async get(key: string): Promise<string | null> {
    this.assertOpen();
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (isExpired(entry, this.now())) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlMs: number | null): Promise<void> {
    this.assertOpen();
    this.sweep();
    this.entries.set(key, { value, expiresAt: expiryFrom(this.now(), ttlMs) });
  }

  async delete(keys: readonly string[]): Promise<void> {
    this.assertOpen();
    for (const key of keys) {
      this.entries.delete(key);
      this.sets.delete(key);
    }
  }

  async increment(key: string, ttlMs: number | null): Promise<number> {
    this.assertOpen();
    const now = this.now();
    const entry = this.entries.get(key);

    if (entry && !isExpired(entry, now)) {
      const next = (Number.parseInt(entry.value, 10) || 0) + 1;
      entry.value = String(next);
      return next;
    }

    this.sweep();
    this.entries.set(key, { value: '1', expiresAt: expiryFrom(now, ttlMs) });
    return 1;
  }

  async addToSet(key: string, member: string): Promise<void> {
    this.assertOpen();
    let set = this.sets.get(key);
    if (!set) {
      set = new Set();
      this.sets.set(key, set);
    }
    set.add(member);
  }

  async getSet(key: string): Promise<string[]> {
    this.assertOpen();
    return [...(this.sets.get(key) ?? [])];
  }

  async removeFromSet(key: string, members: readonly string[]): Promise<void> {
    this.assertOpen();
    const set = this.sets.get(key);
    if (!set) return;
    for (const member of members) set.delete(member);
    if (set.size === 0) this.sets.delete(key);
  }

  async ping(): Promise<void> {
    this.assertOpen();
  }

  async close(): Promise<void> {
    this.closed = true;
    this.entries.clear();
    this.sets.clear();
  }

  private assertOpen(): void {
    if (this.closed) throw new Error('Memory cache backend is closed');
  }

  private sweep(): void {
    const now = this.now();
    if (now - this.lastSweep < this.sweepIntervalMs) return;
    this.lastSweep = now;
    for (const [key, entry] of this.entries) {
      if (isExpired(entry, now)) this.entries.delete(key);
    }
  }
}
