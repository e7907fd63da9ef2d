import { Command } from 'commander';
import type { ApiClient } from '../api-client.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createStatsCommand(client: () => ApiClient): Command {
  return new Command('stats')
    .description('Show task statistics')
    .action(() => $try(async () => {
      for (const line of out.formatStats(await client().getStats())) {
        console.log(line);
      }
    }));
}
