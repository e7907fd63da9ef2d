import { MemoryCacheBackend, loadConfig } from '@tasktrack/core';
import type { CacheBackend } from '@tasktrack/core';
import { createApp } from '../src/app.js';
import type { App } from '../src/app.js';
import { createAppContext } from '../src/context.js';
import type { AppContext } from '../src/context.js';

export const START = Date.parse('2025-03-10T12:00:10.000Z');

export interface TestApp {
  app: App;
  context: AppContext;
  clock: { ms: number };
  request(method: string, path: string, init?: { body?: unknown; raw?: string; headers?: Record<string, string>; ip?: string }): Promise<Response>;
}

/**
 * App over an in-memory store and a clock-driven memory cache.
 * Pass `makeBackend` to swap the cache (returning null turns caching off).
 */
export function createTestApp(
  env: Record<string, string> = {},
  makeBackend?: (now: () => number) => CacheBackend | null,
): TestApp {
  const clock = { ms: START };
  const now = () => clock.ms;
  const config = loadConfig({
    DATABASE_PATH: ':memory:',
    CACHE_BACKEND: 'memory',
    CACHE_TIMEOUT_MS: '20',
    ...env,
  });
  const cacheBackend = makeBackend ? makeBackend(now) : new MemoryCacheBackend({ now });
  const context = createAppContext(config, { cacheBackend, now });
  const app = createApp(context);

  return {
    app,
    context,
    clock,
    request(method, path, init = {}) {
      const headers = new Headers(init.headers);
      let body: string | undefined;
      if (init.raw !== undefined) {
        body = init.raw;
      } else if (init.body !== undefined) {
        body = JSON.stringify(init.body);
        headers.set('Content-Type', 'application/json');
      }
      return app.fetch(
        new Request(`http://localhost${path}`, { method, headers, body }),
        { remoteAddress: init.ip ?? '127.0.0.1' },
      );
    },
  };
}

export async function readJsonBody(response: Response): Promise<unknown> {
  return JSON.parse(await response.text());
}
