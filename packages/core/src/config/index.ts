/**
 * Configuration for the service.
 * Reads environment variables (optionally seeded from a .env file) and
 * exposes them as one typed, validated object.
 */
import * as dotenv from 'dotenv';
import { join } from 'node:path';
import { getDefaultDataDir } from '../db.js';
import { ConfigError } from '../errors/index.js';
import { loggingOptionsFromEnv } from '../logging/index.js';
import type { LoggingOptions } from '../logging/index.js';
import { DEFAULT_ROUTE_LIMITS } from '../ratelimit/rate-limiter.js';

export const CACHE_BACKENDS = ['memory', 'sqlite', 'none'] as const;
export type CacheBackendKind = (typeof CACHE_BACKENDS)[number];

export interface ServerConfig {
  host: string;
  port: number;
  apiPrefix: string;
  corsOrigin: string;
  trustProxy: boolean;
  workers: number;
  maxBodyBytes: number;
}

export interface CacheConfig {
  backend: CacheBackendKind;
  path: string;
  timeoutMs: number;
  itemTtlMs: number;
  listTtlMs: number;
}

export interface StatsConfig {
  ttlMs: number;
  timeZone: string;
}

export interface RateLimitConfig {
  enabled: boolean;
  windowMs: number;
  limits: Record<string, number>;
}

export interface MetricsConfig {
  enabled: boolean;
}

export interface AppConfig {
  env: string;
  server: ServerConfig;
  database: { path: string };
  cache: CacheConfig;
  stats: StatsConfig;
  rateLimit: RateLimitConfig;
  metrics: MetricsConfig;
  logging: LoggingOptions;
}

/**
 * Typed accessors over an environment record
 */
export class EnvReader {
  constructor(private readonly env: NodeJS.ProcessEnv) {}

  getString(key: string): string | undefined {
    const value = this.env[key];
    return value === undefined || value.trim() === '' ? undefined : value.trim();
  }

  getStringOrDefault(key: string, defaultValue: string): string {
    return this.getString(key) ?? defaultValue;
  }

  getNumberOrDefault(key: string, defaultValue: number, opts: { min?: number; integer?: boolean } = {}): number {
    const raw = this.getString(key);
    if (raw === undefined) return defaultValue;

    const value = Number(raw);
    if (!Number.isFinite(value)) {
      throw new ConfigError(`${key} must be a number, got '${raw}'`);
    }
    if (opts.integer && !Number.isInteger(value)) {
      throw new ConfigError(`${key} must be an integer, got '${raw}'`);
    }
    if (opts.min !== undefined && value < opts.min) {
      throw new ConfigError(`${key} must be at least ${opts.min}, got ${value}`);
    }
    return value;
  }

  getBooleanOrDefault(key: string, defaultValue: boolean): boolean {
    const raw = this.getString(key);
    if (raw === undefined) return defaultValue;

    switch (raw.toLowerCase()) {
      case 'true': case '1': case 'yes': case 'on': return true;
      case 'false': case '0': case 'no': case 'off': return false;
      default: throw new ConfigError(`${key} must be a boolean, got '${raw}'`);
    }
  }

  getRequiredString(key: string): string {
    const value = this.getString(key);
    if (value === undefined) {
      throw new ConfigError(`Required configuration value not found: ${key}`);
    }
    return value;
  }
}

/** RATE_LIMIT_TASKS_CREATE -> tasks.create */
export function rateLimitEnvKey(route: string): string {
  return `RATE_LIMIT_${route.toUpperCase().replace(/\./g, '_')}`;
}

function assertTimeZone(timeZone: string): string {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
  } catch {
    throw new ConfigError(`STATS_TIME_ZONE is not a known IANA time zone: '${timeZone}'`);
  }
  return timeZone;
}

function normalizePrefix(prefix: string): string {
  if (prefix === '' || prefix === '/') return '';
  const withSlash = prefix.startsWith('/') ? prefix : `/${prefix}`;
  return withSlash.replace(/\/+$/, '');
}

/**
 * Build the configuration from an environment record.
 * Pure: does not read .env files, so tests can pass a literal record.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const r = new EnvReader(env);
  const dataDir = r.getStringOrDefault('DATA_DIR', getDefaultDataDir());

  const backend = r.getStringOrDefault('CACHE_BACKEND', 'sqlite').toLowerCase();
  if (!CACHE_BACKENDS.some(kind => kind === backend)) {
    throw new ConfigError(`CACHE_BACKEND must be one of ${CACHE_BACKENDS.join(', ')}, got '${backend}'`);
  }

  const limits: Record<string, number> = {};
  for (const [route, defaultLimit] of Object.entries(DEFAULT_ROUTE_LIMITS)) {
    limits[route] = r.getNumberOrDefault(rateLimitEnvKey(route), defaultLimit, { min: 1, integer: true });
  }

  const logging = loggingOptionsFromEnv(env);
  const rawLevel = r.getString('LOG_LEVEL');
  if (rawLevel !== undefined && rawLevel.toLowerCase() !== logging.level) {
    throw new ConfigError(`LOG_LEVEL must be one of error, warn, info, verbose, debug, silent, got '${rawLevel}'`);
  }

  return {
    env: r.getStringOrDefault('NODE_ENV', 'production'),
    server: {
      host: r.getStringOrDefault('HOST', '0.0.0.0'),
      port: r.getNumberOrDefault('PORT', 5000, { min: 0, integer: true }),
      apiPrefix: normalizePrefix(r.getStringOrDefault('API_PREFIX', '/api')),
      corsOrigin: r.getStringOrDefault('CORS_ORIGIN', '*'),
      trustProxy: r.getBooleanOrDefault('TRUST_PROXY', false),
      workers: r.getNumberOrDefault('WEB_CONCURRENCY', 1, { min: 1, integer: true }),
      maxBodyBytes: r.getNumberOrDefault('MAX_BODY_BYTES', 1024 * 1024, { min: 1, integer: true }),
    },
    database: {
      path: r.getStringOrDefault('DATABASE_PATH', join(dataDir, 'tasktrack.db')),
    },
    cache: {
      backend: backend === 'memory' || backend === 'none' ? backend : 'sqlite',
      path: r.getStringOrDefault('CACHE_PATH', join(dataDir, 'cache.db')),
      timeoutMs: r.getNumberOrDefault('CACHE_TIMEOUT_MS', 250, { min: 1 }),
      itemTtlMs: r.getNumberOrDefault('CACHE_ITEM_TTL_MS', 60_000, { min: 1 }),
      listTtlMs: r.getNumberOrDefault('CACHE_LIST_TTL_MS', 30_000, { min: 1 }),
    },
    stats: {
      ttlMs: r.getNumberOrDefault('STATS_TTL_MS', 30_000, { min: 1 }),
      timeZone: assertTimeZone(r.getStringOrDefault('STATS_TIME_ZONE', 'UTC')),
    },
    rateLimit: {
      enabled: r.getBooleanOrDefault('RATE_LIMIT_ENABLED', true),
      windowMs: r.getNumberOrDefault('RATE_LIMIT_WINDOW_MS', 60_000, { min: 1 }),
      limits,
    },
    metrics: {
      enabled: r.getBooleanOrDefault('METRICS_ENABLED', true),
    },
    logging,
  };
}

/** Load `.env` into process.env (existing variables win), then build the config */
export function loadConfigFromEnvironment(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
