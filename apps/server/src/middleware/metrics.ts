import type { Middleware } from '../http/types.js';
import { UNMATCHED_ROUTE } from '../metrics/http-metrics.js';
import type { HttpMetrics } from '../metrics/http-metrics.js';

/** Count and time every request under the name of the route it matched */
export function requestMetrics(metrics: HttpMetrics): Middleware {
  return async (ctx, next) => {
    const startTime = performance.now();
    const response = await next();
    metrics.observe(ctx.method, ctx.routeName ?? UNMATCHED_ROUTE, response.status, (performance.now() - startTime) / 1000);
    return response;
  };
}
