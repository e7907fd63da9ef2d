import type { TaskService } from '@tasktrack/core';
import type { Router } from '../http/router.js';
import { json } from '../http/response.js';

/** Aggregate stats; a degraded result is still a 200 */
export function registerStatsRoutes(router: Router, service: TaskService, prefix: string): void {
  router.get(`${prefix}/stats`, 'stats', async () => json(await service.stats()));
}
