export { TaskService } from './task-service.js';
export type { TaskServiceDeps } from './task-service.js';
