export { Priority, PriorityName, PRIORITIES, isPriority, normalizePriority } from './priority.js';
export type { TaskId, Task, NewTask, TaskChanges, TaskFilter, TaskJson } from './task.js';
export { toTaskJson } from './task.js';
export type { TaskStats } from './stats.js';
