import {
  parseNewTask,
  parseNewTaskBatch,
  parseTaskFilter,
  parseTaskId,
  parseTaskPatch,
  parseTaskReplacement,
  toTaskJson,
} from '@tasktrack/core';
import type { TaskService } from '@tasktrack/core';
import type { Router } from '../http/router.js';
import { readJson } from '../http/request.js';
import { json, noContent } from '../http/response.js';
import type { Context } from '../http/types.js';

export interface TaskRouteOptions {
  prefix: string;
  maxBodyBytes: number;
}

/**
 * Task CRUD. Ids and bodies are validated before the service is called.
 */
export function registerTaskRoutes(router: Router, service: TaskService, options: TaskRouteOptions): void {
  const { prefix, maxBodyBytes } = options;
  const idOf = (ctx: Context) => parseTaskId(ctx.params['id'] ?? '');

  router
    .get(`${prefix}/tasks`, 'tasks.list', async ctx => {
      const tasks = await service.list(parseTaskFilter(ctx.query));
      return json(tasks.map(toTaskJson));
    })
    .post(`${prefix}/tasks`, 'tasks.create', async ctx => {
      const input = parseNewTask(await readJson(ctx, maxBodyBytes));
      return json(toTaskJson(await service.create(input)), 201);
    })
    .post(`${prefix}/tasks/batch`, 'tasks.batch', async ctx => {
      const inputs = parseNewTaskBatch(await readJson(ctx, maxBodyBytes));
      const created = await service.createMany(inputs);
      return json(created.map(toTaskJson), 201);
    })
    .get(`${prefix}/tasks/:id`, 'tasks.get', async ctx => {
      return json(toTaskJson(await service.get(idOf(ctx))));
    })
    .put(`${prefix}/tasks/:id`, 'tasks.update', async ctx => {
      const id = idOf(ctx);
      const replacement = parseTaskReplacement(await readJson(ctx, maxBodyBytes));
      return json(toTaskJson(await service.update(id, replacement)));
    })
    .patch(`${prefix}/tasks/:id`, 'tasks.patch', async ctx => {
      const id = idOf(ctx);
      const changes = parseTaskPatch(await readJson(ctx, maxBodyBytes));
      return json(toTaskJson(await service.patch(id, changes)));
    })
    .post(`${prefix}/tasks/:id/toggle`, 'tasks.toggle', async ctx => {
      return json(toTaskJson(await service.toggleComplete(idOf(ctx))));
    })
    .delete(`${prefix}/tasks/:id`, 'tasks.delete', async ctx => {
      await service.remove(idOf(ctx));
      return noContent();
    });
}
