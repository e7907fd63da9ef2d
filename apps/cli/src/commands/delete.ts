import { Command } from 'commander';
import type { ApiClient } from '../api-client.js';
import * as out from '../output.js';
import { $try, parseTaskIdArg } from '../helpers.js';

export function createDeleteCommand(client: () => ApiClient): Command {
  return new Command('delete')
    .description('Delete one or more tasks')
    .argument('<taskIds...>', 'The task IDs to delete')
    .action((taskIds: string[]) => $try(async () => {
      const ids = taskIds.map(parseTaskIdArg);
      for (const id of ids) {
        await client().deleteTask(id);
        out.success(`Task ${id} deleted`);
      }
    }));
}
