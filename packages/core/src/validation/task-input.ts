/**
 * Request validation. Everything here runs before the store is touched and
 * reports problems as a ValidationError with one issue per offending field.
 */
import { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import type { FieldIssue } from '../errors/index.js';
import { normalizePriority } from '../types/priority.js';
import type { NewTask, TaskChanges, TaskFilter, TaskId } from '../types/task.js';

export const MAX_TITLE_LENGTH = 200;
export const MAX_BATCH_SIZE = 100;
export const MAX_PAGE_SIZE = 500;

const DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})(?:$|T)/;

/** Reduce a calendar date or ISO date-time to yyyy-MM-dd; null when it is not a real date */
export function toCalendarDate(value: string): string | null {
  const match = DATE_PREFIX.exec(value.trim());
  if (!match) return null;
  const [, y, m, d] = match;
  const year = Number(y);
  const month = Number(m);
  const day = Number(d);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  if (value.trim().length > 10 && Number.isNaN(Date.parse(value.trim()))) return null;
  return `${y}-${m}-${d}`;
}

const titleSchema = z
  .string({ required_error: 'title is required', invalid_type_error: 'title must be a string' })
  .trim()
  .min(1, 'title must not be empty')
  .max(MAX_TITLE_LENGTH, `title must be at most ${MAX_TITLE_LENGTH} characters`);

const descriptionSchema = z
  .string({ invalid_type_error: 'description must be a string' })
  .trim()
  .nullable()
  .optional()
  .transform(value => (value === undefined || value === null || value === '' ? null : value));

/** Omitted or invalid priorities fall back to Low */
const prioritySchema = z.unknown().transform(normalizePriority);

const dueDateSchema = z
  .string({ invalid_type_error: 'due_date must be a string' })
  .nullable()
  .optional()
  .transform((value, ctx) => {
    if (value === undefined || value === null || value.trim() === '') return null;
    const date = toCalendarDate(value);
    if (date === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'due_date must be a date (YYYY-MM-DD)' });
      return z.NEVER;
    }
    return date;
  });

const completedSchema = z.boolean({ invalid_type_error: 'completed must be a boolean' });

const objectBody = { invalid_type_error: 'request body must be a JSON object', required_error: 'request body is required' };

export const createTaskSchema = z.object({
  title: titleSchema,
  description: descriptionSchema,
  priority: prioritySchema,
  due_date: dueDateSchema,
}, objectBody);

/** PUT: every field is replaced, omitted ones reset to their defaults */
export const updateTaskSchema = z.object({
  title: titleSchema,
  description: descriptionSchema,
  priority: prioritySchema,
  completed: completedSchema.optional().default(false),
  due_date: dueDateSchema,
}, objectBody);

/** PATCH: only the fields present change */
export const patchTaskSchema = z.object({
  title: titleSchema.optional(),
  description: z.string({ invalid_type_error: 'description must be a string' }).trim().nullable().optional(),
  priority: z.unknown().optional(),
  completed: completedSchema.optional(),
  due_date: z.string({ invalid_type_error: 'due_date must be a string' }).nullable().optional(),
}, objectBody);

export const batchSchema = z.object({
  tasks: z
    .array(z.unknown(), { invalid_type_error: 'tasks must be an array', required_error: 'tasks is required' })
    .min(1, 'tasks must contain at least one task')
    .max(MAX_BATCH_SIZE, `tasks must contain at most ${MAX_BATCH_SIZE} tasks`),
}, objectBody);

const queryFlag = z.enum(['true', 'false'], {
  errorMap: () => ({ message: "completed must be 'true' or 'false'" }),
});

const queryPriority = z.enum(['1', '2', '3'], {
  errorMap: () => ({ message: 'priority must be 1, 2 or 3' }),
});

const queryInt = (field: string, min: number, max?: number) =>
  z.string()
    .regex(/^\d+$/, `${field} must be a non-negative integer`)
    .transform(Number)
    .pipe(max === undefined
      ? z.number().int().min(min, `${field} must be at least ${min}`)
      : z.number().int().min(min, `${field} must be at least ${min}`).max(max, `${field} must be at most ${max}`));

export const listQuerySchema = z.object({
  search: z.string().optional(),
  completed: queryFlag.optional(),
  priority: queryPriority.optional(),
  limit: queryInt('limit', 1, MAX_PAGE_SIZE).optional(),
  offset: queryInt('offset', 0).optional(),
});

export function issuesFromZod(error: z.ZodError): FieldIssue[] {
  return error.issues.map(issue => ({
    field: issue.path.length > 0 ? issue.path.join('.') : 'body',
    message: issue.message,
  }));
}

function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown, message: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(message, issuesFromZod(result.error));
  }
  return result.data;
}

export function parseNewTask(body: unknown): NewTask {
  const input = parseWith(createTaskSchema, body, 'Invalid task');
  return {
    title: input.title,
    description: input.description,
    priority: input.priority,
    dueDate: input.due_date,
  };
}

/** Full replacement: the result names every mutable field */
export function parseTaskReplacement(body: unknown): Required<TaskChanges> {
  const input = parseWith(updateTaskSchema, body, 'Invalid task');
  return {
    title: input.title,
    description: input.description,
    priority: input.priority,
    completed: input.completed,
    dueDate: input.due_date,
  };
}

export function parseTaskPatch(body: unknown): TaskChanges {
  const input = parseWith(patchTaskSchema, body, 'Invalid task');
  const changes: { -readonly [K in keyof TaskChanges]: TaskChanges[K] } = {};
  const issues: FieldIssue[] = [];

  if (input.title !== undefined) changes.title = input.title;
  if (input.description !== undefined) {
    changes.description = input.description === null || input.description === '' ? null : input.description;
  }
  if (input.priority !== undefined) changes.priority = normalizePriority(input.priority);
  if (input.completed !== undefined) changes.completed = input.completed;
  if (input.due_date !== undefined) {
    if (input.due_date === null || input.due_date.trim() === '') {
      changes.dueDate = null;
    } else {
      const date = toCalendarDate(input.due_date);
      if (date === null) issues.push({ field: 'due_date', message: 'due_date must be a date (YYYY-MM-DD)' });
      else changes.dueDate = date;
    }
  }

  if (issues.length > 0) throw new ValidationError('Invalid task', issues);
  if (Object.keys(changes).length === 0) {
    throw new ValidationError('No fields to update', [{ field: 'body', message: 'at least one field must be provided' }]);
  }
  return changes;
}

/**
 * Batch body: `{ "tasks": [...] }` or a bare array. Every item is validated
 * before anything is returned, so one bad item rejects the whole batch.
 */
export function parseNewTaskBatch(body: unknown): NewTask[] {
  const envelope = parseWith(batchSchema, Array.isArray(body) ? { tasks: body } : body, 'Invalid batch');

  const issues: FieldIssue[] = [];
  const parsed: NewTask[] = [];
  envelope.tasks.forEach((item, index) => {
    const result = createTaskSchema.safeParse(item);
    if (!result.success) {
      for (const issue of issuesFromZod(result.error)) {
        const field = issue.field === 'body' ? `tasks.${index}` : `tasks.${index}.${issue.field}`;
        issues.push({ field, message: issue.message });
      }
      return;
    }
    parsed.push({
      title: result.data.title,
      description: result.data.description,
      priority: result.data.priority,
      dueDate: result.data.due_date,
    });
  });

  if (issues.length > 0) throw new ValidationError('Invalid batch', issues);
  return parsed;
}

/** List filter from query-string parameters; unknown parameters are ignored */
export function parseTaskFilter(params: URLSearchParams | Record<string, string | undefined>): TaskFilter {
  const record = params instanceof URLSearchParams ? Object.fromEntries(params) : params;
  const input = parseWith(listQuerySchema, record, 'Invalid filter');
  const search = input.search?.trim();

  return {
    ...(search ? { search } : {}),
    ...(input.completed !== undefined ? { completed: input.completed === 'true' } : {}),
    ...(input.priority !== undefined ? { priority: normalizePriority(input.priority) } : {}),
    ...(input.limit !== undefined ? { limit: input.limit } : {}),
    ...(input.offset !== undefined ? { offset: input.offset } : {}),
  };
}

export function parseTaskId(raw: string): TaskId {
  if (!/^\d+$/.test(raw)) {
    throw new ValidationError('Invalid task id', [{ field: 'id', message: 'id must be a positive integer' }]);
  }
  const id = Number(raw);
  if (!Number.isSafeInteger(id) || id < 1) {
    throw new ValidationError('Invalid task id', [{ field: 'id', message: 'id must be a positive integer' }]);
  }
  return id;
}
