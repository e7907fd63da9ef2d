import type { HealthCheck } from '../health/health-check.js';
import type { Router } from '../http/router.js';
import { json } from '../http/response.js';

/** Probes are mounted at the root and under the API prefix */
export function registerHealthRoutes(router: Router, health: HealthCheck, prefix: string): void {
  const bases = prefix === '' ? [''] : ['', prefix];

  for (const base of bases) {
    router
      .get(`${base}/health`, 'health', () => json(health.liveness()))
      .get(`${base}/ready`, 'ready', async () => {
        const readiness = await health.readiness();
        return json(readiness, readiness.status === 'ready' ? 200 : 503);
      });
  }
}
