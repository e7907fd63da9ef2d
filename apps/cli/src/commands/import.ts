import { readFile } from 'node:fs/promises';
import { Command } from 'commander';
import type { ApiClient } from '../api-client.js';
import * as out from '../output.js';
import { $try, parseImportFile } from '../helpers.js';

export function createImportCommand(client: () => ApiClient): Command {
  return new Command('import')
    .description('Create tasks from a JSON file in one all-or-nothing batch')
    .argument('<file>', 'JSON array of tasks, or { "tasks": [...] }')
    .action((file: string) => $try(async () => {
      const items = parseImportFile(await readFile(file, 'utf-8'));
      const created = await client().createTasks(items);
      out.success(`Imported ${created.length} task${created.length === 1 ? '' : 's'}`);
    }));
}
