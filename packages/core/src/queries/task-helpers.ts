import type { tasks } from '../schema/tasks.js';
import type { Task, TaskChanges } from '../types/task.js';
import { normalizePriority } from '../types/priority.js';

export type TaskRow = typeof tasks.$inferSelect;
export type TaskRowUpdate = Partial<Omit<TaskRow, 'id' | 'createdAt' | 'ownerId'>>;

/** Map a Drizzle row to a Task */
export function toTask(row: TaskRow): Task {
  return { ...row, priority: normalizePriority(row.priority) };
}

/** Escape LIKE wildcards so user text matches literally (ESCAPE '\') */
export function escapeLike(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/%/g, '\\%').replace(/_/g, '\\_');
}

/**
 * Column values for applying `changes` to `current` at `now`.
 * completed_at is stamped on false -> true, cleared on true -> false and
 * left alone otherwise, so it is set exactly when the task is completed.
 */
export function applyChanges(current: Task, changes: TaskChanges, now: string): TaskRowUpdate {
  const update: TaskRowUpdate = { updatedAt: now };

  if (changes.title !== undefined) update.title = changes.title;
  if (changes.description !== undefined) update.description = changes.description;
  if (changes.priority !== undefined) update.priority = changes.priority;
  if (changes.dueDate !== undefined) update.dueDate = changes.dueDate;

  if (changes.completed !== undefined && changes.completed !== current.completed) {
    update.completed = changes.completed;
    update.completedAt = changes.completed ? now : null;
  }
  return update;
}
