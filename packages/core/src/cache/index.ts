import type { CacheBackend } from './cache-backend.js';
import { MemoryCacheBackend } from './memory-backend.js';
import { SqliteCacheBackend } from './sqlite-backend.js';
import type { CacheConfig } from '../config/index.js';

export type { CacheBackend, ExpiringEntry } from './cache-backend.js';
export { expiryFrom, isExpired } from './cache-backend.js';
export { MemoryCacheBackend } from './memory-backend.js';
export type { MemoryCacheOptions } from './memory-backend.js';
export { SqliteCacheBackend } from './sqlite-backend.js';
export type { SqliteCacheOptions } from './sqlite-backend.js';
export { CacheClient, guarded } from './cache-client.js';
export { canonicalFilter, fingerprint } from './fingerprint.js';
export { TaskCache, itemKey, listKey } from './task-cache.js';
export type { TaskCacheTtls } from './task-cache.js';
export { InvalidationRegistry, REGISTRY_KEY, REGISTRY_VERSION_KEY } from './invalidation-registry.js';

/** Open the configured backend; `none` yields null (caching off) */
export function createCacheBackend(config: Pick<CacheConfig, 'backend' | 'path'>): CacheBackend | null {
  switch (config.backend) {
    case 'memory':
      return new MemoryCacheBackend();
    case 'sqlite':
      return new SqliteCacheBackend(config.path);
    case 'none':
      return null;
  }
}
