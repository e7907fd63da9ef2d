export {
  MAX_TITLE_LENGTH,
  MAX_BATCH_SIZE,
  MAX_PAGE_SIZE,
  toCalendarDate,
  createTaskSchema,
  updateTaskSchema,
  patchTaskSchema,
  batchSchema,
  listQuerySchema,
  issuesFromZod,
  parseNewTask,
  parseTaskReplacement,
  parseTaskPatch,
  parseNewTaskBatch,
  parseTaskFilter,
  parseTaskId,
} from './task-input.js';
