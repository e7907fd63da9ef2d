import { CacheClient } from '../../src/cache/cache-client.js';
import type { CacheBackend } from '../../src/cache/cache-backend.js';
import { MemoryCacheBackend } from '../../src/cache/memory-backend.js';
import { InvalidationRegistry } from '../../src/cache/invalidation-registry.js';
import { TaskCache } from '../../src/cache/task-cache.js';
import { createTestDb } from '../../src/db.js';
import type { TaskDb } from '../../src/db.js';
import { TaskService } from '../../src/service/task-service.js';
import { StatsAggregator } from '../../src/stats/stats-aggregator.js';
import type { NewTask } from '../../src/types/task.js';

export function newTask(title: string, overrides: Partial<NewTask> = {}): NewTask {
  return { title, description: null, priority: 1, dueDate: null, ...overrides };
}

/** Settable clock shared by the service and the stats aggregator */
export class TestClock {
  constructor(public ms: number = Date.parse('2025-03-10T12:00:00.000Z')) {}

  advance(ms: number): void {
    this.ms += ms;
  }

  now = (): number => this.ms;
  date = (): Date => new Date(this.ms);
}

export interface ServiceHarness {
  db: TaskDb;
  client: CacheClient;
  cache: TaskCache;
  registry: InvalidationRegistry;
  stats: StatsAggregator;
  service: TaskService;
  clock: TestClock;
}

export type BackendFactory = (clock: TestClock) => CacheBackend | null;

export const memoryBackend: BackendFactory = clock => new MemoryCacheBackend({ now: clock.now });

export function createHarness(
  makeBackend: BackendFactory = memoryBackend,
  opts: { timeoutMs?: number; statsTtlMs?: number } = {},
): ServiceHarness {
  const db = createTestDb();
  const clock = new TestClock();
  const client = new CacheClient(makeBackend(clock), opts.timeoutMs ?? 50);
  const cache = new TaskCache(client, { itemTtlMs: 60_000, listTtlMs: 30_000 });
  const registry = new InvalidationRegistry(client);
  const stats = new StatsAggregator(db, client, { ttlMs: opts.statsTtlMs ?? 30_000, timeZone: 'UTC', now: clock.now });
  const service = new TaskService({ db, cache, registry, stats, now: clock.date });
  return { db, client, cache, registry, stats, service, clock };
}
