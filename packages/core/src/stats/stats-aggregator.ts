import { z } from 'zod';
import type { CacheClient } from '../cache/cache-client.js';
import type { TaskDb } from '../db.js';
import { errorMessage } from '../errors/index.js';
import { getLogger } from '../logging/index.js';
import { aggregateTasks } from '../queries/task-queries.js';
import type { TaskStats } from '../types/stats.js';

const log = getLogger('StatsAggregator');

export const STATS_KEY = 'stats:tasks';

/** A local calendar day never starts more than 26h before now, DST included */
const RECENT_WINDOW_MS = 26 * 60 * 60 * 1000;

const cachedStatsSchema = z.object({
  total: z.number(),
  completed: z.number(),
  pending: z.number(),
  completionRate: z.number(),
  priorityBreakdown: z.object({ 1: z.number(), 2: z.number(), 3: z.number() }),
  createdToday: z.number(),
  generatedAt: z.string(),
});

export interface StatsAggregatorOptions {
  ttlMs: number;
  /** IANA zone that decides which calendar day "today" is */
  timeZone: string;
  now?: () => number;
}

export function completionRate(completed: number, total: number): number {
  if (total === 0) return 0;
  return Math.round((completed / total) * 100 * 100) / 100;
}

/** yyyy-MM-dd of `instant` as seen in `timeZone` */
export function calendarDay(instant: Date, timeZone: string): string {
  // en-CA formats dates as yyyy-MM-dd
  return new Intl.DateTimeFormat('en-CA', { timeZone, year: 'numeric', month: '2-digit', day: '2-digit' }).format(instant);
}

export function emptyStats(generatedAt: string): TaskStats {
  return {
    total: 0,
    completed: 0,
    pending: 0,
    completionRate: 0,
    priorityBreakdown: { 1: 0, 2: 0, 3: 0 },
    createdToday: 0,
    generatedAt,
  };
}

/**
 * Aggregate counts over all tasks, cached for a short TTL. Mutations do not
 * evict the cached result, so it may lag writes by up to one TTL.
 */
export class StatsAggregator {
  private readonly now: () => number;

  constructor(
    private readonly db: TaskDb,
    private readonly cache: CacheClient,
    private readonly options: StatsAggregatorOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  async getStats(): Promise<TaskStats> {
    const cached = await this.readCached();
    if (cached) return cached;

    let stats: TaskStats;
    try {
      stats = this.compute();
    } catch (err: unknown) {
      log.error('Could not compute stats, returning placeholder', err instanceof Error ? err : { error: errorMessage(err) });
      return { ...emptyStats(new Date(this.now()).toISOString()), degraded: true };
    }

    if (this.cache.enabled) {
      try {
        await this.cache.set(STATS_KEY, JSON.stringify(stats), this.options.ttlMs);
      } catch (err: unknown) {
        log.warn('Could not cache stats', { error: errorMessage(err) });
      }
    }
    return stats;
  }

  /** Aggregate straight from the store */
  compute(): TaskStats {
    const now = new Date(this.now());
    const aggregate = aggregateTasks(this.db, new Date(now.getTime() - RECENT_WINDOW_MS).toISOString());
    const today = calendarDay(now, this.options.timeZone);
    const createdToday = aggregate.recentCreatedAt
      .filter(createdAt => calendarDay(new Date(createdAt), this.options.timeZone) === today)
      .length;

    return {
      total: aggregate.total,
      completed: aggregate.completed,
      pending: aggregate.total - aggregate.completed,
      completionRate: completionRate(aggregate.completed, aggregate.total),
      priorityBreakdown: aggregate.byPriority,
      createdToday,
      generatedAt: now.toISOString(),
    };
  }

  private async readCached(): Promise<TaskStats | null> {
    if (!this.cache.enabled) return null;
    let raw: string | null;
    try {
      raw = await this.cache.get(STATS_KEY);
    } catch (err: unknown) {
      log.warn('Stats cache unavailable, recomputing', { error: errorMessage(err) });
      return null;
    }
    if (raw === null) return null;

    try {
      const parsed = cachedStatsSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : null;
    } catch {
      log.warn('Discarding unreadable stats entry');
      return null;
    }
  }
}
