import { Command } from 'commander';
import type { ApiClient, TaskQuery } from '../api-client.js';
import * as out from '../output.js';
import { $try, completionFilter, parsePriorityArg } from '../helpers.js';

interface ListOptions {
  search?: string;
  completed?: boolean;
  pending?: boolean;
  priority?: string;
}

export function createListCommand(client: () => ApiClient): Command {
  return new Command('list')
    .description('List tasks, newest first')
    .option('-s, --search <text>', 'Match title or description')
    .option('-c, --completed', 'Show only completed tasks')
    .option('-p, --pending', 'Show only pending tasks')
    .option('--priority <level>', 'Filter by priority (low, medium, high)')
    .action((opts: ListOptions) => $try(async () => {
      const query: TaskQuery = {};
      if (opts.search !== undefined) query.search = opts.search;
      const completed = completionFilter(opts.completed, opts.pending);
      if (completed !== undefined) query.completed = completed;
      if (opts.priority !== undefined) {
        const priority = parsePriorityArg(opts.priority);
        if (priority === null) throw new Error(`Unknown priority: ${opts.priority}`);
        query.priority = priority;
      }

      const tasks = await client().listTasks(query);
      out.printTasks(tasks, completed === true
        ? 'No completed tasks found'
        : completed === false
          ? 'No pending tasks found'
          : 'No tasks saved yet... use the add command to create one');
    }));
}
