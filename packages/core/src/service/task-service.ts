/**
 * Orchestrates the store, the task cache, the invalidation registry and the
 * stats aggregator. Inputs arrive already validated.
 */
import { fingerprint } from '../cache/fingerprint.js';
import type { InvalidationRegistry } from '../cache/invalidation-registry.js';
import { itemKey, listKey } from '../cache/task-cache.js';
import type { TaskCache } from '../cache/task-cache.js';
import type { TaskDb } from '../db.js';
import { withRetry } from '../db.js';
import { AppError, NotFoundError, StoreFailureError, errorMessage } from '../errors/index.js';
import { getLogger } from '../logging/index.js';
import {
  deleteTask,
  deleteTasksCreatedBefore,
  getTaskById,
  insertTask,
  insertTasks,
  listTasks,
  updateTask,
} from '../queries/task-queries.js';
import type { StatsAggregator } from '../stats/stats-aggregator.js';
import type { TaskStats } from '../types/stats.js';
import type { NewTask, Task, TaskChanges, TaskFilter, TaskId } from '../types/task.js';

const log = getLogger('TaskService');

export interface TaskServiceDeps {
  db: TaskDb;
  cache: TaskCache;
  registry: InvalidationRegistry;
  stats: StatsAggregator;
  now?: () => Date;
}

export class TaskService {
  private readonly db: TaskDb;
  private readonly cache: TaskCache;
  private readonly registry: InvalidationRegistry;
  private readonly aggregator: StatsAggregator;
  private readonly now: () => Date;

  constructor(deps: TaskServiceDeps) {
    this.db = deps.db;
    this.cache = deps.cache;
    this.registry = deps.registry;
    this.aggregator = deps.stats;
    this.now = deps.now ?? (() => new Date());
  }

  // -------------------------------------------------------------------------
  // Reads (cache-aside)
  // -------------------------------------------------------------------------

  async list(filter: TaskFilter = {}): Promise<Task[]> {
    if (!this.cache.enabled) {
      return this.store('list tasks', () => listTasks(this.db, filter));
    }

    const fp = fingerprint(filter);
    const hit = await this.cache.getList(fp);
    if (hit) return hit;

    const before = await this.registry.version();
    const tasks = await this.store('list tasks', () => listTasks(this.db, filter));
    if (before === null) return tasks;

    if (await this.cache.putList(fp, tasks)) {
      await this.registry.register(fp);
      await this.discardIfRaced(before, listKey(fp));
    }
    return tasks;
  }

  async get(id: TaskId): Promise<Task> {
    if (!this.cache.enabled) {
      return this.requireFound(id, await this.store('get task', () => getTaskById(this.db, id)));
    }

    const hit = await this.cache.getItem(id);
    if (hit) return hit;

    const before = await this.registry.version();
    const task = this.requireFound(id, await this.store('get task', () => getTaskById(this.db, id)));
    if (before !== null && await this.cache.putItem(id, task)) {
      await this.discardIfRaced(before, itemKey(id));
    }
    return task;
  }

  stats(): Promise<TaskStats> {
    return this.aggregator.getStats();
  }

  // -------------------------------------------------------------------------
  // Writes (invalidate after commit)
  // -------------------------------------------------------------------------

  async create(input: NewTask): Promise<Task> {
    const task = await this.store('create task', () => insertTask(this.db, input, this.timestamp()));
    await this.registry.invalidate([]);
    log.info('Task created', { id: task.id });
    return task;
  }

  async createMany(inputs: readonly NewTask[]): Promise<Task[]> {
    const created = await this.store('create tasks', () => insertTasks(this.db, inputs, this.timestamp()));
    await this.registry.invalidate([]);
    log.info('Tasks created', { count: created.length });
    return created;
  }

  /** Full replacement of the mutable fields */
  update(id: TaskId, replacement: Required<TaskChanges>): Promise<Task> {
    return this.mutate(id, 'update task', replacement);
  }

  /** Change only the fields given */
  patch(id: TaskId, changes: TaskChanges): Promise<Task> {
    return this.mutate(id, 'patch task', changes);
  }

  /** Flip `completed`, read and written in one transaction */
  toggleComplete(id: TaskId): Promise<Task> {
    return this.mutate(id, 'toggle task', current => ({ completed: !current.completed }));
  }

  async remove(id: TaskId): Promise<void> {
    const deleted = await this.store('delete task', () => deleteTask(this.db, id));
    if (!deleted) throw new NotFoundError(`Task ${id} not found`);
    await this.registry.invalidate([id]);
    log.info('Task deleted', { id });
  }

  /** Delete tasks created before `cutoff`; returns how many went */
  async purgeCreatedBefore(cutoff: Date): Promise<number> {
    const ids = await this.store('purge tasks', () => deleteTasksCreatedBefore(this.db, cutoff.toISOString()));
    if (ids.length > 0) await this.registry.invalidate(ids);
    log.info('Purged old tasks', { count: ids.length, cutoff: cutoff.toISOString() });
    return ids.length;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async mutate(
    id: TaskId,
    operation: string,
    changes: TaskChanges | ((current: Task) => TaskChanges),
  ): Promise<Task> {
    const updated = await this.store(operation, () => updateTask(this.db, id, changes, this.timestamp()));
    if (!updated) throw new NotFoundError(`Task ${id} not found`);
    await this.registry.invalidate([id]);
    log.debug('Task updated', { id, operation });
    return updated;
  }

  /** A mutation landed while we were reading the store: our entry may predate it */
  private async discardIfRaced(before: string, key: string): Promise<void> {
    const after = await this.registry.version();
    if (after !== before) {
      log.debug('Version moved during population, discarding entry', { key });
      await this.cache.evict([key]);
    }
  }

  private requireFound(id: TaskId, task: Task | null): Task {
    if (!task) throw new NotFoundError(`Task ${id} not found`);
    return task;
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  /** Run a store call, retrying lock contention and mapping failures to StoreFailureError */
  private async store<T>(operation: string, fn: () => T): Promise<T> {
    try {
      return await withRetry(fn);
    } catch (err: unknown) {
      if (err instanceof AppError) throw err;
      log.error(`Store failure during ${operation}`, err instanceof Error ? err : { error: errorMessage(err) });
      throw new StoreFailureError(`Could not ${operation}`, { cause: err });
    }
  }
}
