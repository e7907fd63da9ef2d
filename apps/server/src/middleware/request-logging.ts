import { getLogger } from '@tasktrack/core';
import type { Middleware } from '../http/types.js';

const log = getLogger('HTTP');

/** Probe and scrape paths are logged at debug */
const QUIET_SUFFIXES = ['/health', '/ready', '/metrics'];

export function requestLogging(): Middleware {
  return async (ctx, next) => {
    const startTime = performance.now();
    const response = await next();
    const duration = Math.round(performance.now() - startTime);

    const line = `${ctx.method} ${ctx.url.pathname} ${response.status} ${duration}ms`;
    const data = { client: ctx.clientIp, route: ctx.routeName };
    if (QUIET_SUFFIXES.some(suffix => ctx.url.pathname.endsWith(suffix))) {
      log.debug(line, data);
    } else {
      log.info(line, data);
    }
    return response;
  };
}
