import { z } from 'zod';
import type { CacheClient } from './cache-client.js';
import type { Task, TaskId } from '../types/task.js';
import { errorMessage } from '../errors/index.js';
import { getLogger } from '../logging/index.js';

const log = getLogger('TaskCache');

export const itemKey = (id: TaskId): string => `item:${id}`;
export const listKey = (fingerprint: string): string => `list:${fingerprint}`;

const cachedTaskSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  description: z.string().nullable(),
  priority: z.union([z.literal(1), z.literal(2), z.literal(3)]),
  completed: z.boolean(),
  dueDate: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
  completedAt: z.string().nullable(),
  ownerId: z.number().int().nullable(),
});

const cachedListSchema = z.array(cachedTaskSchema);

export interface TaskCacheTtls {
  itemTtlMs: number;
  listTtlMs: number;
}

/**
 * Read-through storage for single tasks and list results.
 * Reads never throw: a failure or an unreadable payload is a miss.
 * Writes are best effort and report whether they landed.
 */
export class TaskCache {
  constructor(
    private readonly client: CacheClient,
    private readonly ttls: TaskCacheTtls,
  ) {}

  get enabled(): boolean {
    return this.client.enabled;
  }

  async getItem(id: TaskId): Promise<Task | null> {
    const parsed = cachedTaskSchema.safeParse(await this.read(itemKey(id)));
    return parsed.success ? parsed.data : null;
  }

  async putItem(id: TaskId, task: Task): Promise<boolean> {
    return this.write(itemKey(id), JSON.stringify(task), this.ttls.itemTtlMs);
  }

  async getList(fingerprint: string): Promise<Task[] | null> {
    const parsed = cachedListSchema.safeParse(await this.read(listKey(fingerprint)));
    return parsed.success ? parsed.data : null;
  }

  async putList(fingerprint: string, tasks: readonly Task[]): Promise<boolean> {
    return this.write(listKey(fingerprint), JSON.stringify(tasks), this.ttls.listTtlMs);
  }

  async evict(keys: readonly string[]): Promise<boolean> {
    if (!this.client.enabled || keys.length === 0) return true;
    try {
      await this.client.delete(keys);
      return true;
    } catch (err: unknown) {
      log.warn('Cache eviction failed', { keys, error: errorMessage(err) });
      return false;
    }
  }

  /** Raw JSON value under `key`, or undefined on a miss */
  private async read(key: string): Promise<unknown> {
    if (!this.client.enabled) return undefined;
    let raw: string | null;
    try {
      raw = await this.client.get(key);
    } catch (err: unknown) {
      log.warn('Cache read failed, treating as miss', { key, error: errorMessage(err) });
      return undefined;
    }
    if (raw === null) return undefined;

    try {
      return JSON.parse(raw);
    } catch {
      log.warn('Discarding unreadable cache entry', { key });
      return undefined;
    }
  }

  private async write(key: string, value: string, ttlMs: number): Promise<boolean> {
    if (!this.client.enabled) return false;
    try {
      await this.client.set(key, value, ttlMs);
      return true;
    } catch (err: unknown) {
      log.warn('Cache write failed, skipping', { key, error: errorMessage(err) });
      return false;
    }
  }
}
