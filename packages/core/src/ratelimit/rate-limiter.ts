/**
 * Fixed-window request admission, counted in the shared cache backend so
 * every worker sees the same budget.
 */
import type { CacheClient } from '../cache/cache-client.js';
import { errorMessage } from '../errors/index.js';
import { getLogger } from '../logging/index.js';

const log = getLogger('RateLimiter');

/** Requests per window for each limited route */
export const DEFAULT_ROUTE_LIMITS = {
  'tasks.list': 100,
  'tasks.create': 50,
  'tasks.batch': 10,
  'tasks.update': 50,
  'tasks.patch': 50,
  'tasks.toggle': 50,
  'tasks.delete': 50,
} as const satisfies Record<string, number>;

export type LimitedRoute = keyof typeof DEFAULT_ROUTE_LIMITS;

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Epoch ms at which the current window closes */
  resetAt: number;
  retryAfterSeconds: number;
}

export interface RateLimiterOptions {
  enabled: boolean;
  windowMs: number;
  limits: Record<string, number>;
  now?: () => number;
}

export function rateLimitKey(route: string, clientKey: string, windowStart: number): string {
  return `ratelimit:${route}:${clientKey}:${windowStart}`;
}

export class RateLimiter {
  private readonly now: () => number;

  constructor(
    private readonly client: CacheClient,
    private readonly options: RateLimiterOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  /** Budget for `route`; undefined when the route is not limited */
  limitFor(route: string): number | undefined {
    return this.options.limits[route];
  }

  /**
   * Count one request against `route` for `clientKey`.
   * Unlimited routes, a disabled limiter and an unreachable backend all admit.
   */
  async admit(clientKey: string, route: string): Promise<RateLimitDecision> {
    const now = this.now();
    const windowMs = this.options.windowMs;
    const windowStart = Math.floor(now / windowMs) * windowMs;
    const resetAt = windowStart + windowMs;
    const limit = this.limitFor(route);

    // limit 0 marks an unmetered decision
    if (!this.options.enabled || limit === undefined || !this.client.enabled) {
      return { allowed: true, limit: 0, remaining: 0, resetAt, retryAfterSeconds: 0 };
    }

    let count: number;
    try {
      count = await this.client.increment(rateLimitKey(route, clientKey, windowStart), windowMs);
    } catch (err: unknown) {
      log.warn('Rate limit backend unavailable, admitting request', { route, error: errorMessage(err) });
      return { allowed: true, limit, remaining: limit, resetAt, retryAfterSeconds: 0 };
    }

    if (count > limit) {
      const retryAfterSeconds = Math.max(1, Math.ceil((resetAt - now) / 1000));
      log.debug('Request rejected', { route, clientKey, count, limit });
      return { allowed: false, limit, remaining: 0, resetAt, retryAfterSeconds };
    }
    return { allowed: true, limit, remaining: limit - count, resetAt, retryAfterSeconds: 0 };
  }
}
