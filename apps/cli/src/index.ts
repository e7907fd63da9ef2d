#!/usr/bin/env node

import { Command } from 'commander';
import { ApiClient, DEFAULT_API_URL } from './api-client.js';

import { createListCommand } from './commands/list.js';
import { createAddCommand } from './commands/add.js';
import { createGetCommand } from './commands/get.js';
import { createToggleCommand } from './commands/toggle.js';
import { createDeleteCommand } from './commands/delete.js';
import { createStatsCommand } from './commands/stats.js';
import { createImportCommand } from './commands/import.js';

// Build the CLI program
const program = new Command()
  .name('tasktrack')
  .description('Terminal client for the task API')
  .version('1.0.0')
  .option('--api-url <url>', 'Base URL of the task API', process.env['TASKTRACK_API_URL'] ?? DEFAULT_API_URL);

// Resolved per command, after the global options are parsed
const client = () => new ApiClient(program.opts<{ apiUrl: string }>().apiUrl);

// Register commands
program.addCommand(createListCommand(client));
program.addCommand(createAddCommand(client));
program.addCommand(createGetCommand(client));
program.addCommand(createToggleCommand(client));
program.addCommand(createDeleteCommand(client));
program.addCommand(createStatsCommand(client));
program.addCommand(createImportCommand(client));

await program.parseAsync();
