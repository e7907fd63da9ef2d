/**
 * The request pipeline as a web-standard fetch handler:
 * logging -> metrics -> CORS -> error mapping -> router (rate limit -> handler).
 */
import { getLogger } from '@tasktrack/core';
import type { AppContext } from './context.js';
import { clientIp } from './http/request.js';
import { internalErrorResponse } from './http/response.js';
import { Router } from './http/router.js';
import type { ConnectionInfo, Context, Middleware } from './http/types.js';
import { cors } from './middleware/cors.js';
import { errorHandler } from './middleware/error-handler.js';
import { requestMetrics } from './middleware/metrics.js';
import { rateLimit } from './middleware/rate-limit.js';
import { requestLogging } from './middleware/request-logging.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerMetricsRoutes } from './routes/metrics.js';
import { registerStatsRoutes } from './routes/stats.js';
import { registerTaskRoutes } from './routes/tasks.js';

const log = getLogger('App');

export interface App {
  router: Router;
  fetch(request: Request, info?: ConnectionInfo): Promise<Response>;
}

export function createApp(context: AppContext): App {
  const { server } = context.config;

  const router = new Router().use(rateLimit(context.limiter));
  registerHealthRoutes(router, context.health, server.apiPrefix);
  registerTaskRoutes(router, context.service, { prefix: server.apiPrefix, maxBodyBytes: server.maxBodyBytes });
  registerStatsRoutes(router, context.service, server.apiPrefix);
  if (context.metrics) registerMetricsRoutes(router, context.metrics);

  const pipeline: Middleware[] = [
    requestLogging(),
    ...(context.metrics ? [requestMetrics(context.metrics)] : []),
    cors({ origin: server.corsOrigin }),
    errorHandler(),
  ];

  async function run(ctx: Context): Promise<Response> {
    let index = 0;
    const next = async (): Promise<Response> => {
      const middleware = pipeline[index++];
      return middleware ? middleware(ctx, next) : router.handle(ctx);
    };
    return next();
  }

  return {
    router,
    async fetch(request, info = {}) {
      const url = new URL(request.url);
      const ctx: Context = {
        request,
        url,
        method: request.method.toUpperCase(),
        params: {},
        query: url.searchParams,
        clientIp: clientIp(request, info, server.trustProxy),
      };
      try {
        return await run(ctx);
      } catch (err: unknown) {
        log.error('Request pipeline failed', err instanceof Error ? err : { error: String(err) });
        return internalErrorResponse();
      }
    },
  };
}
