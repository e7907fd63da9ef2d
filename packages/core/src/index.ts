// Types
export * from './types/index.js';

// Database
export {
  createDb,
  createTestDb,
  closeDb,
  pingDb,
  getRawDb,
  withRetry,
  getDefaultDataDir,
  getDefaultDbPath,
  CREATE_SCHEMA_SQL,
} from './db.js';
export type { TaskDb } from './db.js';

// Schema
export { tasks } from './schema/index.js';

// Queries
export * from './queries/index.js';

// Cache, registry, rate limiting
export * from './cache/index.js';
export * from './ratelimit/index.js';

// Stats
export * from './stats/index.js';

// Validation
export * from './validation/index.js';

// Service
export * from './service/index.js';

// Errors, logging, config
export * from './errors/index.js';
export * from './logging/index.js';
export {
  loadConfig,
  loadConfigFromEnvironment,
  rateLimitEnvKey,
  EnvReader,
  CACHE_BACKENDS,
} from './config/index.js';
export type {
  AppConfig,
  ServerConfig,
  CacheConfig,
  StatsConfig,
  RateLimitConfig,
  MetricsConfig,
  CacheBackendKind,
} from './config/index.js';
