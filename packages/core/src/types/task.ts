import type { Priority } from './priority.js';

export type TaskId = number;

export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly description: string | null;
  readonly priority: Priority;
  readonly completed: boolean;
  readonly dueDate: string | null; // yyyy-MM-dd
  readonly createdAt: string; // ISO string
  readonly updatedAt: string; // ISO string
  readonly completedAt: string | null; // ISO string, set iff completed
  /** Reserved for an access-control layer; never populated by the API */
  readonly ownerId: number | null;
}

/** Fields a caller supplies when creating a task */
export interface NewTask {
  readonly title: string;
  readonly description: string | null;
  readonly priority: Priority;
  readonly dueDate: string | null;
}

/** Mutable fields; absent keys are left untouched */
export interface TaskChanges {
  readonly title?: string;
  readonly description?: string | null;
  readonly priority?: Priority;
  readonly completed?: boolean;
  readonly dueDate?: string | null;
}

export interface TaskFilter {
  readonly search?: string;
  readonly completed?: boolean;
  readonly priority?: Priority;
  readonly limit?: number;
  readonly offset?: number;
}

/** JSON shape on the wire (snake_case) */
export interface TaskJson {
  id: TaskId;
  title: string;
  description: string | null;
  priority: Priority;
  completed: boolean;
  due_date: string | null;
  created_at: string;
  updated_at: string;
  completed_at: string | null;
}

export function toTaskJson(task: Task): TaskJson {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    priority: task.priority,
    completed: task.completed,
    due_date: task.dueDate,
    created_at: task.createdAt,
    updated_at: task.updatedAt,
    completed_at: task.completedAt,
  };
}
