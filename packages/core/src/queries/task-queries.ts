/**
 * Task persistence using Drizzle ORM. Every function is synchronous; each
 * mutation runs inside one better-sqlite3 transaction.
 */

import { and, count, desc, eq, gte, lt, sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type { TaskDb } from '../db.js';
import { casefold, getRawDb } from '../db.js';
import { tasks } from '../schema/tasks.js';
import type { NewTask, Task, TaskChanges, TaskFilter, TaskId } from '../types/task.js';
import { normalizePriority } from '../types/priority.js';
import type { Priority } from '../types/priority.js';
import { applyChanges, escapeLike, toTask } from './task-helpers.js';

/** Largest LIMIT SQLite accepts from a JS number; used when only an offset is given */
const NO_LIMIT = Number.MAX_SAFE_INTEGER;

// ---------------------------------------------------------------------------
// Read queries
// ---------------------------------------------------------------------------

export function getTaskById(db: TaskDb, taskId: TaskId): Task | null {
  const row = db.select().from(tasks).where(eq(tasks.id, taskId)).get();
  return row ? toTask(row) : null;
}

/**
 * Tasks matching `filter`, newest first (created_at desc, then id desc).
 * `search` is a case-insensitive substring match on title or description.
 */
export function listTasks(db: TaskDb, filter: TaskFilter = {}): Task[] {
  const conditions: SQL[] = [];

  if (filter.search !== undefined && filter.search !== '') {
    const pattern = `%${escapeLike(casefold(filter.search))}%`;
    conditions.push(sql`(casefold(${tasks.title}) LIKE ${pattern} ESCAPE '\\' OR casefold(${tasks.description}) LIKE ${pattern} ESCAPE '\\')`);
  }
  if (filter.completed !== undefined) {
    conditions.push(eq(tasks.completed, filter.completed));
  }
  if (filter.priority !== undefined) {
    conditions.push(eq(tasks.priority, filter.priority));
  }

  let query = db.select().from(tasks)
    .where(conditions.length > 0 ? and(...conditions) : undefined)
    .orderBy(desc(tasks.createdAt), desc(tasks.id))
    .$dynamic();

  if (filter.limit !== undefined || filter.offset !== undefined) {
    query = query.limit(filter.limit ?? NO_LIMIT).offset(filter.offset ?? 0);
  }
  return query.all().map(toTask);
}

export interface TaskAggregate {
  total: number;
  completed: number;
  byPriority: Record<Priority, number>;
  /** created_at of every task created at or after the requested instant */
  recentCreatedAt: string[];
}

/** Read-only counts behind the stats endpoint */
export function aggregateTasks(db: TaskDb, recentSince: string): TaskAggregate {
  const raw = getRawDb(db);
  const read = raw.transaction((): TaskAggregate => {
    const groups = db
      .select({ priority: tasks.priority, completed: tasks.completed, n: count() })
      .from(tasks)
      .groupBy(tasks.priority, tasks.completed)
      .all();

    const byPriority: Record<Priority, number> = { 1: 0, 2: 0, 3: 0 };
    let total = 0;
    let completed = 0;
    for (const group of groups) {
      total += group.n;
      if (group.completed) completed += group.n;
      byPriority[normalizePriority(group.priority)] += group.n;
    }

    const recentCreatedAt = db
      .select({ createdAt: tasks.createdAt })
      .from(tasks)
      .where(gte(tasks.createdAt, recentSince))
      .all()
      .map(row => row.createdAt);

    return { total, completed, byPriority, recentCreatedAt };
  });
  return read();
}

export function countTasks(db: TaskDb): number {
  const row = db.select({ n: count() }).from(tasks).get();
  return row?.n ?? 0;
}

// ---------------------------------------------------------------------------
// Mutations
// ---------------------------------------------------------------------------

function insertRow(db: TaskDb, input: NewTask, now: string): Task {
  const row = db.insert(tasks).values({
    title: input.title,
    description: input.description,
    priority: input.priority,
    completed: false,
    dueDate: input.dueDate,
    createdAt: now,
    updatedAt: now,
    completedAt: null,
  }).returning().get();
  return toTask(row);
}

/** Insert a new, incomplete task */
export function insertTask(db: TaskDb, input: NewTask, now: string): Task {
  const run = getRawDb(db).transaction(() => insertRow(db, input, now));
  return run();
}

/** Insert every task or none of them */
export function insertTasks(db: TaskDb, inputs: readonly NewTask[], now: string): Task[] {
  const run = getRawDb(db).transaction(() => inputs.map(input => insertRow(db, input, now)));
  return run();
}

/**
 * Apply changes to a task. `changes` may be computed from the current row
 * inside the transaction (toggle). Returns null when the task does not exist.
 */
export function updateTask(
  db: TaskDb,
  taskId: TaskId,
  changes: TaskChanges | ((current: Task) => TaskChanges),
  now: string,
): Task | null {
  const run = getRawDb(db).transaction((): Task | null => {
    const current = getTaskById(db, taskId);
    if (!current) return null;

    const resolved = typeof changes === 'function' ? changes(current) : changes;
    const row = db.update(tasks)
      .set(applyChanges(current, resolved, now))
      .where(eq(tasks.id, taskId))
      .returning()
      .get();
    return row ? toTask(row) : null;
  });
  return run();
}

/** Hard delete; false when nothing matched */
export function deleteTask(db: TaskDb, taskId: TaskId): boolean {
  const run = getRawDb(db).transaction(() =>
    db.delete(tasks).where(eq(tasks.id, taskId)).run().changes > 0);
  return run();
}

/** Delete tasks created strictly before `cutoff`; returns their ids */
export function deleteTasksCreatedBefore(db: TaskDb, cutoff: string): TaskId[] {
  const run = getRawDb(db).transaction(() =>
    db.delete(tasks).where(lt(tasks.createdAt, cutoff)).returning({ id: tasks.id }).all().map(row => row.id));
  return run();
}

