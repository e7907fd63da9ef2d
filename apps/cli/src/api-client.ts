/**
 * HTTP client for the task API. Error bodies are decoded into ApiError.
 */
import { z } from 'zod';
import { errorMessage } from '@tasktrack/core';
import type { TaskJson, TaskStats } from '@tasktrack/core';

export const DEFAULT_API_URL = 'http://localhost:5000/api';

const prioritySchema = z.union([z.literal(1), z.literal(2), z.literal(3)]);

const taskSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  description: z.string().nullable(),
  priority: prioritySchema,
  completed: z.boolean(),
  due_date: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
  completed_at: z.string().nullable(),
});

const statsSchema = z.object({
  total: z.number(),
  completed: z.number(),
  pending: z.number(),
  completionRate: z.number(),
  priorityBreakdown: z.object({ 1: z.number(), 2: z.number(), 3: z.number() }),
  createdToday: z.number(),
  generatedAt: z.string(),
  degraded: z.boolean().optional(),
});

const errorBodySchema = z.object({
  kind: z.string(),
  message: z.string(),
  details: z.array(z.object({ field: z.string(), message: z.string() })).optional(),
});

export interface FieldDetail {
  field: string;
  message: string;
}

export class ApiError extends Error {
  constructor(
    readonly status: number,
    readonly kind: string,
    message: string,
    readonly details: readonly FieldDetail[] = [],
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export interface TaskQuery {
  search?: string;
  completed?: boolean;
  priority?: number;
}

/** Request body for creating a task, in wire format */
export interface CreateTaskBody {
  title: string;
  description?: string;
  priority?: number;
  due_date?: string;
}

export class ApiClient {
  readonly baseUrl: string;

  constructor(baseUrl: string = DEFAULT_API_URL) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  listTasks(query: TaskQuery = {}): Promise<TaskJson[]> {
    const params = new URLSearchParams();
    if (query.search !== undefined) params.set('search', query.search);
    if (query.completed !== undefined) params.set('completed', String(query.completed));
    if (query.priority !== undefined) params.set('priority', String(query.priority));
    const qs = params.toString();
    return this.fetchJson(z.array(taskSchema), 'GET', qs === '' ? '/tasks' : `/tasks?${qs}`);
  }

  getTask(id: number): Promise<TaskJson> {
    return this.fetchJson(taskSchema, 'GET', `/tasks/${id}`);
  }

  createTask(body: CreateTaskBody): Promise<TaskJson> {
    return this.fetchJson(taskSchema, 'POST', '/tasks', body);
  }

  /** Items are sent as read; the server validates them */
  createTasks(items: readonly unknown[]): Promise<TaskJson[]> {
    return this.fetchJson(z.array(taskSchema), 'POST', '/tasks/batch', { tasks: items });
  }

  toggleTask(id: number): Promise<TaskJson> {
    return this.fetchJson(taskSchema, 'POST', `/tasks/${id}/toggle`);
  }

  async deleteTask(id: number): Promise<void> {
    await this.send('DELETE', `/tasks/${id}`);
  }

  getStats(): Promise<TaskStats> {
    return this.fetchJson(statsSchema, 'GET', '/stats');
  }

  private async fetchJson<T>(schema: z.ZodType<T>, method: string, path: string, body?: unknown): Promise<T> {
    const { status, text } = await this.send(method, path, body);
    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch {
      throw new ApiError(status, 'INVALID_RESPONSE', `${method} ${path} returned malformed JSON`);
    }
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      throw new ApiError(status, 'INVALID_RESPONSE', `${method} ${path} returned an unexpected body`);
    }
    return parsed.data;
  }

  private async send(method: string, path: string, body?: unknown): Promise<{ status: number; text: string }> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    let payload: string | undefined;
    if (body !== undefined) {
      payload = JSON.stringify(body);
      headers['Content-Type'] = 'application/json';
    }

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, { method, headers, body: payload });
    } catch (err: unknown) {
      throw new ApiError(0, 'NETWORK_ERROR', `Could not reach ${this.baseUrl}: ${errorMessage(err)}`);
    }

    const text = await response.text();
    if (!response.ok) throw apiErrorFrom(response.status, text);
    return { status: response.status, text };
  }
}

function apiErrorFrom(status: number, text: string): ApiError {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return new ApiError(status, 'HTTP_ERROR', `Request failed with status ${status}`);
  }
  const parsed = errorBodySchema.safeParse(value);
  if (!parsed.success) {
    return new ApiError(status, 'HTTP_ERROR', `Request failed with status ${status}`);
  }
  return new ApiError(status, parsed.data.kind, parsed.data.message, parsed.data.details ?? []);
}
