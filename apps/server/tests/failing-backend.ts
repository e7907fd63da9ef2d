import type { CacheBackend } from '@tasktrack/core';

/** Cache backend whose every call is refused */
export class FailingBackend implements CacheBackend {
  readonly name = 'failing';

  private refuse<T>(): Promise<T> {
    return Promise.reject(new Error('connection refused'));
  }

  get(): Promise<string | null> { return this.refuse(); }
  set(): Promise<void> { return this.refuse(); }
  delete(): Promise<void> { return this.refuse(); }
  increment(): Promise<number> { return this.refuse(); }
  addToSet(): Promise<void> { return this.refuse(); }
  getSet(): Promise<string[]> { return this.refuse(); }
  removeFromSet(): Promise<void> { return this.refuse(); }
  ping(): Promise<void> { return this.refuse(); }
  async close(): Promise<void> {}
}
