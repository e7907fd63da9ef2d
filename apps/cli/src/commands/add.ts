import { Command } from 'commander';
import type { ApiClient, CreateTaskBody } from '../api-client.js';
import * as out from '../output.js';
import { $try, parsePriorityArg } from '../helpers.js';

interface AddOptions {
  description?: string;
  priority?: string;
  due?: string;
}

export function createAddCommand(client: () => ApiClient): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<title>', 'Task title')
    .option('-d, --description <text>', 'Longer description')
    .option('--priority <level>', 'low, medium or high')
    .option('--due <date>', 'Due date (YYYY-MM-DD)')
    .action((title: string, opts: AddOptions) => $try(async () => {
      const body: CreateTaskBody = { title };
      if (opts.description !== undefined) body.description = opts.description;
      if (opts.due !== undefined) body.due_date = opts.due;
      if (opts.priority !== undefined) {
        const priority = parsePriorityArg(opts.priority);
        if (priority === null) throw new Error(`Unknown priority: ${opts.priority}`);
        body.priority = priority;
      }

      const task = await client().createTask(body);
      out.success(`Task ${task.id} saved. Use the list command to see your tasks`);
    }));
}
