import { Command } from 'commander';
import type { ApiClient } from '../api-client.js';
import * as out from '../output.js';
import { $try, parseTaskIdArg } from '../helpers.js';

export function createGetCommand(client: () => ApiClient): Command {
  return new Command('get')
    .description('Get detailed information about a task')
    .argument('<taskId>', 'The task ID to retrieve')
    .option('--json', 'Output in JSON format')
    .action((taskId: string, opts: { json?: boolean }) => $try(async () => {
      const task = await client().getTask(parseTaskIdArg(taskId));
      if (opts.json) {
        console.log(JSON.stringify(task, null, 2));
      } else {
        out.printTaskDetail(task);
      }
    }));
}
