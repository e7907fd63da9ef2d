import type { CacheBackend } from './cache-backend.js';
import { DependencyUnavailableError, errorMessage } from '../errors/index.js';

/**
 * Race a backend call against a timer. Any failure, including the timeout,
 * surfaces as a DependencyUnavailableError for the caller to degrade on.
 */
export async function guarded<T>(operation: string, timeoutMs: number, fn: () => Promise<T>): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new DependencyUnavailableError(`cache ${operation} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(), timeout]);
  } catch (err: unknown) {
    if (err instanceof DependencyUnavailableError) throw err;
    throw new DependencyUnavailableError(`cache ${operation} failed: ${errorMessage(err)}`, { cause: err });
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Time-bounded view of a CacheBackend. A null backend means caching is
 * switched off: `enabled` is false and callers skip the cache entirely.
 */
export class CacheClient {
  constructor(
    private readonly backend: CacheBackend | null,
    readonly timeoutMs: number,
  ) {}

  get enabled(): boolean {
    return this.backend !== null;
  }

  get backendName(): string {
    return this.backend?.name ?? 'none';
  }

  private call<T>(operation: string, fn: (backend: CacheBackend) => Promise<T>): Promise<T> {
    const backend = this.backend;
    if (!backend) {
      return Promise.reject(new DependencyUnavailableError(`cache ${operation} failed: caching is disabled`));
    }
    return guarded(operation, this.timeoutMs, () => fn(backend));
  }

  get(key: string): Promise<string | null> {
    return this.call('get', b => b.get(key));
  }

  set(key: string, value: string, ttlMs: number | null): Promise<void> {
    return this.call('set', b => b.set(key, value, ttlMs));
  }

  delete(keys: readonly string[]): Promise<void> {
    if (keys.length === 0) return Promise.resolve();
    return this.call('delete', b => b.delete(keys));
  }

  increment(key: string, ttlMs: number | null): Promise<number> {
    return this.call('increment', b => b.increment(key, ttlMs));
  }

  addToSet(key: string, member: string): Promise<void> {
    return this.call('addToSet', b => b.addToSet(key, member));
  }

  getSet(key: string): Promise<string[]> {
    return this.call('getSet', b => b.getSet(key));
  }

  removeFromSet(key: string, members: readonly string[]): Promise<void> {
    if (members.length === 0) return Promise.resolve();
    return this.call('removeFromSet', b => b.removeFromSet(key, members));
  }

  ping(): Promise<void> {
    return this.call('ping', b => b.ping());
  }

  async close(): Promise<void> {
    await this.backend?.close();
  }
}
