import type { Router } from '../http/router.js';
import type { HttpMetrics } from '../metrics/http-metrics.js';

/** Scrape endpoint, mounted at the root like the original deployment */
export function registerMetricsRoutes(router: Router, metrics: HttpMetrics): void {
  router.get('/metrics', 'metrics', async () => new Response(await metrics.render(), {
    status: 200,
    headers: { 'Content-Type': metrics.contentType },
  }));
}
