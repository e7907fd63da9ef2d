/**
 * HTTP type definitions
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS' | 'HEAD';

/** Connection details the web Request does not carry */
export interface ConnectionInfo {
  remoteAddress?: string;
}

/**
 * Request context for middleware and handlers
 */
export interface Context {
  request: Request;
  url: URL;
  method: string;
  params: Record<string, string>;
  query: URLSearchParams;
  /** Client identity used for rate limiting */
  clientIp: string;
  /** Name of the matched route, set by the router */
  routeName?: string;
}

export type Next = () => Promise<Response>;

export type RouteHandler = (ctx: Context) => Promise<Response> | Response;

export type Middleware = (ctx: Context, next: Next) => Promise<Response>;
