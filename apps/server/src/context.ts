/**
 * Process-wide wiring: store, cache, limiter, aggregator, service.
 */
import {
  CacheClient,
  InvalidationRegistry,
  RateLimiter,
  StatsAggregator,
  TaskCache,
  TaskService,
  closeDb,
  createCacheBackend,
  createDb,
  errorMessage,
  getLogger,
  pingDb,
} from '@tasktrack/core';
import type { AppConfig, CacheBackend, TaskDb } from '@tasktrack/core';
import { HealthCheck } from './health/health-check.js';
import { HttpMetrics } from './metrics/http-metrics.js';

const log = getLogger('AppContext');

export interface AppContext {
  config: AppConfig;
  db: TaskDb;
  cacheBackend: CacheBackend | null;
  cacheClient: CacheClient;
  limiter: RateLimiter;
  service: TaskService;
  health: HealthCheck;
  /** Null when METRICS_ENABLED=false */
  metrics: HttpMetrics | null;
}

export interface AppContextOverrides {
  /** Use this backend instead of the configured one (tests) */
  cacheBackend?: CacheBackend | null;
  now?: () => number;
}

export const SERVICE_VERSION = '1.0.0';

/**
 * Open the store (schema applied before anything else) and the cache, then
 * build the components on top. Throws if the store cannot be opened.
 */
export function createAppContext(config: AppConfig, overrides: AppContextOverrides = {}): AppContext {
  const db = createDb(config.database.path);
  const now = overrides.now ?? Date.now;

  let backend: CacheBackend | null;
  try {
    backend = overrides.cacheBackend !== undefined ? overrides.cacheBackend : createCacheBackend(config.cache);
  } catch (err: unknown) {
    closeDb(db);
    throw err;
  }

  const cacheClient = new CacheClient(backend, config.cache.timeoutMs);
  const cache = new TaskCache(cacheClient, { itemTtlMs: config.cache.itemTtlMs, listTtlMs: config.cache.listTtlMs });
  const registry = new InvalidationRegistry(cacheClient);
  const stats = new StatsAggregator(db, cacheClient, { ttlMs: config.stats.ttlMs, timeZone: config.stats.timeZone, now });
  const limiter = new RateLimiter(cacheClient, { ...config.rateLimit, now });
  const service = new TaskService({ db, cache, registry, stats, now: () => new Date(now()) });

  const health = new HealthCheck(SERVICE_VERSION)
    .register('database', async () => {
      pingDb(db);
      return { status: 'pass' };
    })
    .register('cache', async () => {
      if (!cacheClient.enabled) return { status: 'pass', message: 'caching disabled' };
      try {
        await cacheClient.ping();
        return { status: 'pass', message: cacheClient.backendName };
      } catch (err: unknown) {
        return { status: 'fail', message: errorMessage(err) };
      }
    });

  log.info('Application context ready', {
    database: config.database.path,
    cache: cacheClient.backendName,
    rateLimit: config.rateLimit.enabled,
  });
  const metrics = config.metrics.enabled ? new HttpMetrics(SERVICE_VERSION) : null;

  return { config, db, cacheBackend: backend, cacheClient, limiter, service, health, metrics };
}

/** Close the cache, then the store */
export async function closeAppContext(ctx: AppContext): Promise<void> {
  try {
    await ctx.cacheClient.close();
  } catch (err: unknown) {
    log.warn('Error closing cache backend', { error: errorMessage(err) });
  }
  closeDb(ctx.db);
  log.info('Application context closed');
}
