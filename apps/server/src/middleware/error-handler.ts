import { getLogger, isAppError } from '@tasktrack/core';
import type { Middleware } from '../http/types.js';
import { errorResponse, internalErrorResponse } from '../http/response.js';

const log = getLogger('HTTP');

/**
 * Outermost middleware: turns anything thrown below into an error response.
 */
export function errorHandler(): Middleware {
  return async (ctx, next) => {
    try {
      return await next();
    } catch (err: unknown) {
      if (isAppError(err)) {
        if (err.status >= 500) {
          log.error(`${ctx.method} ${ctx.url.pathname} failed`, err);
        } else {
          log.debug(`${ctx.method} ${ctx.url.pathname} rejected`, { kind: err.code, message: err.message });
        }
        return errorResponse(err);
      }
      log.error(`Unhandled error on ${ctx.method} ${ctx.url.pathname}`, err instanceof Error ? err : { error: String(err) });
      return internalErrorResponse();
    }
  };
}
