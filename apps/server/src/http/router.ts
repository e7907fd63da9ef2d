/**
 * URL router. Paths use `:name` segments; matching is exact apart from a
 * trailing slash.
 */
import { MethodNotAllowedError, NotFoundError } from '@tasktrack/core';
import type { Context, HttpMethod, Middleware, RouteHandler } from './types.js';

export interface RouteDefinition {
  method: HttpMethod;
  path: string;
  name: string;
  pattern: RegExp;
  paramNames: string[];
  handler: RouteHandler;
}

export type RouteMatch =
  | { kind: 'found'; route: RouteDefinition; params: Record<string, string> }
  | { kind: 'method-not-allowed'; allowed: HttpMethod[] }
  | { kind: 'not-found' };

/** '/tasks/:id' -> /^\/tasks\/([^/]+)$/ with paramNames ['id'] */
export function compilePath(path: string): { pattern: RegExp; paramNames: string[] } {
  const paramNames: string[] = [];
  const source = path
    .split('/')
    .map(segment => {
      if (segment.startsWith(':')) {
        paramNames.push(segment.slice(1));
        return '([^/]+)';
      }
      return segment.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    })
    .join('\\/');
  return { pattern: new RegExp(`^${source}$`), paramNames };
}

function decodeParam(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    return raw;
  }
}

function normalizePathname(pathname: string): string {
  return pathname.length > 1 ? pathname.replace(/\/+$/, '') : pathname;
}

export class Router {
  private readonly routes: RouteDefinition[] = [];
  private readonly middleware: Middleware[] = [];

  /** Middleware run after a route matched, before its handler */
  use(middleware: Middleware): this {
    this.middleware.push(middleware);
    return this;
  }

  get(path: string, name: string, handler: RouteHandler): this {
    return this.addRoute('GET', path, name, handler);
  }

  post(path: string, name: string, handler: RouteHandler): this {
    return this.addRoute('POST', path, name, handler);
  }

  put(path: string, name: string, handler: RouteHandler): this {
    return this.addRoute('PUT', path, name, handler);
  }

  patch(path: string, name: string, handler: RouteHandler): this {
    return this.addRoute('PATCH', path, name, handler);
  }

  delete(path: string, name: string, handler: RouteHandler): this {
    return this.addRoute('DELETE', path, name, handler);
  }

  addRoute(method: HttpMethod, path: string, name: string, handler: RouteHandler): this {
    const { pattern, paramNames } = compilePath(path);
    this.routes.push({ method, path, name, pattern, paramNames, handler });
    return this;
  }

  getRoutes(): readonly RouteDefinition[] {
    return this.routes;
  }

  match(method: string, pathname: string): RouteMatch {
    const path = normalizePathname(pathname);
    const allowed: HttpMethod[] = [];

    for (const route of this.routes) {
      const result = route.pattern.exec(path);
      if (!result) continue;

      if (route.method !== method) {
        if (!allowed.includes(route.method)) allowed.push(route.method);
        continue;
      }

      const params: Record<string, string> = {};
      route.paramNames.forEach((paramName, i) => {
        params[paramName] = decodeParam(result[i + 1] ?? '');
      });
      return { kind: 'found', route, params };
    }

    return allowed.length > 0 ? { kind: 'method-not-allowed', allowed } : { kind: 'not-found' };
  }

  /** Resolve the route for `ctx` and run it through the router middleware */
  async handle(ctx: Context): Promise<Response> {
    const match = this.match(ctx.method, ctx.url.pathname);
    if (match.kind === 'not-found') {
      throw new NotFoundError(`No route for ${ctx.url.pathname}`);
    }
    if (match.kind === 'method-not-allowed') {
      throw new MethodNotAllowedError(ctx.method, match.allowed);
    }

    ctx.params = match.params;
    ctx.routeName = match.route.name;

    const handler = match.route.handler;
    let index = 0;
    const next = async (): Promise<Response> => {
      const middleware = this.middleware[index++];
      return middleware ? middleware(ctx, next) : handler(ctx);
    };
    return next();
  }
}
