import type { CacheBackend } from '../../src/cache/cache-backend.js';

/**
 * Stand-in for an unreachable cache. `fail` rejects every call at once,
 * `hang` never settles so only the client timeout ends the call.
 */
export class FailingCacheBackend implements CacheBackend {
  readonly name = 'failing';
  calls = 0;

  constructor(private readonly mode: 'fail' | 'hang' = 'fail') {}

  private unavailable<T>(): Promise<T> {
    this.calls++;
    if (this.mode === 'hang') return new Promise<T>(() => {});
    return Promise.reject(new Error('connection refused'));
  }

  get(): Promise<string | null> { return this.unavailable(); }
  set(): Promise<void> { return this.unavailable(); }
  delete(): Promise<void> { return this.unavailable(); }
  increment(): Promise<number> { return this.unavailable(); }
  addToSet(): Promise<void> { return this.unavailable(); }
  getSet(): Promise<string[]> { return this.unavailable(); }
  removeFromSet(): Promise<void> { return this.unavailable(); }
  ping(): Promise<void> { return this.unavailable(); }
  async close(): Promise<void> {}
}
