export { toTask, escapeLike, applyChanges } from './task-helpers.js';
export type { TaskRow, TaskRowUpdate } from './task-helpers.js';

export {
  getTaskById,
  listTasks,
  aggregateTasks,
  countTasks,
  insertTask,
  insertTasks,
  updateTask,
  deleteTask,
  deleteTasksCreatedBefore,
} from './task-queries.js';
export type { TaskAggregate } from './task-queries.js';
