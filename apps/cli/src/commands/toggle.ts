import { Command } from 'commander';
import type { ApiClient } from '../api-client.js';
import * as out from '../output.js';
import { $try, parseTaskIdArg } from '../helpers.js';

export function createToggleCommand(client: () => ApiClient): Command {
  return new Command('toggle')
    .description('Flip a task between completed and pending')
    .argument('<taskId>', 'The task ID')
    .action((taskId: string) => $try(async () => {
      const task = await client().toggleTask(parseTaskIdArg(taskId));
      out.success(task.completed ? `Task ${task.id} completed` : `Task ${task.id} reopened`);
    }));
}
