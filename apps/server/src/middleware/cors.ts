/**
 * CORS headers and preflight OPTIONS handling
 */
import type { Middleware } from '../http/types.js';

export interface CorsOptions {
  /** '*', a single origin, or a comma-separated list */
  origin: string;
  methods?: string[];
  allowedHeaders?: string[];
  exposedHeaders?: string[];
  maxAge?: number;
}

const DEFAULT_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'];
const DEFAULT_ALLOWED_HEADERS = ['Content-Type', 'Authorization'];
const DEFAULT_EXPOSED_HEADERS = ['Retry-After', 'X-RateLimit-Limit', 'X-RateLimit-Remaining', 'X-RateLimit-Reset'];

/**
 * Determine the Access-Control-Allow-Origin header value
 */
export function allowedOrigin(requestOrigin: string | null, configured: string): string | null {
  if (!requestOrigin) return null;
  if (configured === '*') return '*';

  const origins = configured.split(',').map(o => o.trim()).filter(o => o !== '');
  return origins.includes(requestOrigin) ? requestOrigin : null;
}

export function cors(options: CorsOptions): Middleware {
  const methods = options.methods ?? DEFAULT_METHODS;
  const allowedHeaders = options.allowedHeaders ?? DEFAULT_ALLOWED_HEADERS;
  const exposedHeaders = options.exposedHeaders ?? DEFAULT_EXPOSED_HEADERS;
  const maxAge = options.maxAge ?? 86_400;

  return async (ctx, next) => {
    const origin = allowedOrigin(ctx.request.headers.get('origin'), options.origin);

    if (ctx.method === 'OPTIONS') {
      const response = new Response(null, { status: 204 });
      if (origin) response.headers.set('Access-Control-Allow-Origin', origin);
      response.headers.set('Access-Control-Allow-Methods', methods.join(', '));
      response.headers.set('Access-Control-Allow-Headers', allowedHeaders.join(', '));
      response.headers.set('Access-Control-Max-Age', String(maxAge));
      return response;
    }

    const response = await next();
    if (origin) {
      response.headers.set('Access-Control-Allow-Origin', origin);
      if (origin !== '*') response.headers.append('Vary', 'Origin');
      if (exposedHeaders.length > 0) {
        response.headers.set('Access-Control-Expose-Headers', exposedHeaders.join(', '));
      }
    }
    return response;
  };
}
