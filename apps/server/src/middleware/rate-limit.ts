import { RateLimitedError } from '@tasktrack/core';
import type { RateLimitDecision, RateLimiter } from '@tasktrack/core';
import type { Middleware } from '../http/types.js';
import { errorResponse } from '../http/response.js';

function setRateLimitHeaders(headers: Headers, decision: RateLimitDecision): void {
  headers.set('X-RateLimit-Limit', String(decision.limit));
  headers.set('X-RateLimit-Remaining', String(decision.remaining));
  headers.set('X-RateLimit-Reset', String(Math.ceil(decision.resetAt / 1000)));
}

/**
 * Admit or reject the matched route against the client's budget. Runs after
 * routing so the budget is chosen by route name.
 */
export function rateLimit(limiter: RateLimiter): Middleware {
  return async (ctx, next) => {
    const route = ctx.routeName;
    if (route === undefined || limiter.limitFor(route) === undefined) {
      return next();
    }

    const decision = await limiter.admit(ctx.clientIp, route);
    if (!decision.allowed) {
      const response = errorResponse(new RateLimitedError(decision.retryAfterSeconds));
      setRateLimitHeaders(response.headers, decision);
      return response;
    }

    const response = await next();
    if (decision.limit > 0) setRateLimitHeaders(response.headers, decision);
    return response;
  };
}
