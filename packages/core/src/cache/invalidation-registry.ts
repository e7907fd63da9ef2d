import type { CacheClient } from './cache-client.js';
import { itemKey, listKey } from './task-cache.js';
import type { TaskId } from '../types/task.js';
import { errorMessage } from '../errors/index.js';
import { getLogger } from '../logging/index.js';

const log = getLogger('InvalidationRegistry');

export const REGISTRY_KEY = 'registry:tasks';
export const REGISTRY_VERSION_KEY = 'registry:tasks:version';

/**
 * Tracks which list fingerprints currently have a cached result so a
 * mutation can evict all of them, plus a version counter the read path uses
 * to detect a mutation that landed while it was reading the store.
 */
export class InvalidationRegistry {
  constructor(private readonly client: CacheClient) {}

  /**
   * Current version, or null when the cache cannot be reached.
   * Callers treat null as "do not populate".
   */
  async version(): Promise<string | null> {
    if (!this.client.enabled) return null;
    try {
      return (await this.client.get(REGISTRY_VERSION_KEY)) ?? '0';
    } catch (err: unknown) {
      log.warn('Could not read registry version', { error: errorMessage(err) });
      return null;
    }
  }

  async register(fingerprint: string): Promise<void> {
    if (!this.client.enabled) return;
    try {
      await this.client.addToSet(REGISTRY_KEY, fingerprint);
    } catch (err: unknown) {
      log.warn('Could not register list fingerprint', { fingerprint, error: errorMessage(err) });
    }
  }

  /**
   * Evict every entry a committed mutation may have made stale. Best effort:
   * failures are logged and the remaining steps still run.
   */
  async invalidate(itemIds: readonly TaskId[]): Promise<void> {
    if (!this.client.enabled) return;

    try {
      await this.client.increment(REGISTRY_VERSION_KEY, null);
    } catch (err: unknown) {
      log.warn('Could not bump registry version', { error: errorMessage(err) });
    }

    try {
      await this.client.delete(itemIds.map(itemKey));
    } catch (err: unknown) {
      log.warn('Could not evict item entries', { itemIds, error: errorMessage(err) });
    }

    let fingerprints: string[];
    try {
      fingerprints = await this.client.getSet(REGISTRY_KEY);
    } catch (err: unknown) {
      log.warn('Could not read registry set', { error: errorMessage(err) });
      return;
    }
    if (fingerprints.length === 0) return;

    try {
      await this.client.delete(fingerprints.map(listKey));
    } catch (err: unknown) {
      // Members stay registered so the next mutation retries the eviction
      log.warn('Could not evict list entries', { count: fingerprints.length, error: errorMessage(err) });
      return;
    }

    try {
      await this.client.removeFromSet(REGISTRY_KEY, fingerprints);
    } catch (err: unknown) {
      log.warn('Could not prune registry set', { error: errorMessage(err) });
    }
    log.debug('Invalidated cached lists', { lists: fingerprints.length, items: itemIds.length });
  }
}
