export { RateLimiter, DEFAULT_ROUTE_LIMITS, rateLimitKey } from './rate-limiter.js';
export type { RateLimitDecision, RateLimiterOptions, LimitedRoute } from './rate-limiter.js';
