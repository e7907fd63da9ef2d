import { describe, it, expect } from 'vitest';
import { CacheClient } from '../../src/cache/cache-client.js';
import { closeDb, createTestDb } from '../../src/db.js';
import { insertTask, updateTask } from '../../src/queries/task-queries.js';
import { StatsAggregator, calendarDay, completionRate } from '../../src/stats/stats-aggregator.js';
import { FailingCacheBackend } from '../helpers/failing-cache.js';
import { createHarness, newTask } from '../helpers/fixtures.js';

describe('completionRate', () => {
  it('is 0 when there are no tasks', () => {
    expect(completionRate(0, 0)).toBe(0);
  });

  it('rounds to two decimals', () => {
    expect(completionRate(1, 3)).toBe(33.33);
    expect(completionRate(2, 3)).toBe(66.67);
    expect(completionRate(3, 3)).toBe(100);
  });
});

describe('calendarDay', () => {
  it('formats the local day in the given zone', () => {
    const instant = new Date('2025-03-10T16:00:00.000Z');
    expect(calendarDay(instant, 'UTC')).toBe('2025-03-10');
    expect(calendarDay(instant, 'Asia/Tokyo')).toBe('2025-03-11');
  });
});

describe('StatsAggregator', () => {
  it('reports zeros and all three priorities for an empty store', async () => {
    const { stats } = createHarness();
    expect(await stats.getStats()).toEqual({
      total: 0,
      completed: 0,
      pending: 0,
      completionRate: 0,
      priorityBreakdown: { 1: 0, 2: 0, 3: 0 },
      createdToday: 0,
      generatedAt: '2025-03-10T12:00:00.000Z',
    });
  });

  it('aggregates counts', async () => {
    const { db, stats } = createHarness();
    insertTask(db, newTask('a', { priority: 3 }), '2025-03-10T08:00:00.000Z');
    insertTask(db, newTask('b'), '2025-03-09T08:00:00.000Z');
    updateTask(db, 1, { completed: true }, '2025-03-10T09:00:00.000Z');

    const result = await stats.getStats();
    expect(result.total).toBe(2);
    expect(result.completed).toBe(1);
    expect(result.pending).toBe(1);
    expect(result.completionRate).toBe(50);
    expect(result.priorityBreakdown).toEqual({ 1: 1, 2: 0, 3: 1 });
    expect(result.createdToday).toBe(1);
  });

  it('serves the cached result until the TTL passes', async () => {
    const { db, stats, clock } = createHarness();
    insertTask(db, newTask('a'), '2025-03-10T08:00:00.000Z');
    expect((await stats.getStats()).total).toBe(1);

    insertTask(db, newTask('b'), '2025-03-10T08:30:00.000Z');
    clock.advance(29_999);
    expect((await stats.getStats()).total).toBe(1);

    clock.advance(1);
    expect((await stats.getStats()).total).toBe(2);
  });

  it('counts "today" in the configured time zone', () => {
    const db = createTestDb();
    const now = () => Date.parse('2025-03-10T16:00:00.000Z');
    insertTask(db, newTask('late evening in Tokyo'), '2025-03-10T14:30:00.000Z');
    insertTask(db, newTask('just after midnight in Tokyo'), '2025-03-10T15:30:00.000Z');

    const client = new CacheClient(null, 20);
    const tokyo = new StatsAggregator(db, client, { ttlMs: 1000, timeZone: 'Asia/Tokyo', now });
    const utc = new StatsAggregator(db, client, { ttlMs: 1000, timeZone: 'UTC', now });
    expect(tokyo.compute().createdToday).toBe(1);
    expect(utc.compute().createdToday).toBe(2);
  });

  it('still computes when the cache is unreachable', async () => {
    const { db, stats } = createHarness(() => new FailingCacheBackend());
    insertTask(db, newTask('a'), '2025-03-10T08:00:00.000Z');
    expect((await stats.getStats()).total).toBe(1);
  });

  it('degrades to zeros when the store fails', async () => {
    const { db, stats } = createHarness();
    closeDb(db);
    const result = await stats.getStats();
    expect(result.degraded).toBe(true);
    expect(result.total).toBe(0);
    expect(result.priorityBreakdown).toEqual({ 1: 0, 2: 0, 3: 0 });
  });
});
