#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import {
  SqliteCacheBackend,
  configureLogging,
  errorMessage,
  getLogger,
  loadConfigFromEnvironment,
} from '@tasktrack/core';
import type { AppConfig } from '@tasktrack/core';
import { closeAppContext, createAppContext } from './context.js';
import { migrate, serve } from './server.js';

const log = getLogger('Main');

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('Must be a positive integer.');
  return n;
}

function loadConfig(overrides: { port?: number; workers?: number } = {}): AppConfig {
  const config = loadConfigFromEnvironment();
  configureLogging(config.logging);
  if (overrides.port !== undefined) config.server.port = overrides.port;
  if (overrides.workers !== undefined) config.server.workers = overrides.workers;
  return config;
}

/** Log the failure and exit non-zero */
function fail(err: unknown): never {
  log.error('Command failed', err instanceof Error ? err : { error: errorMessage(err) });
  process.exit(1);
}

const program = new Command()
  .name('tasktrack-server')
  .description('Task-tracking REST service')
  .version('1.0.0');

program
  .command('serve', { isDefault: true })
  .description('Start the HTTP server')
  .option('-p, --port <port>', 'Port to listen on (overrides PORT)', parsePositiveInt)
  .option('-w, --workers <count>', 'Worker processes (overrides WEB_CONCURRENCY)', parsePositiveInt)
  .action(async (opts: { port?: number; workers?: number }) => {
    try {
      await serve(loadConfig(opts));
    } catch (err: unknown) {
      fail(err);
    }
  });

program
  .command('migrate')
  .description('Create or update the database schema and exit')
  .action(() => {
    try {
      migrate(loadConfig());
    } catch (err: unknown) {
      fail(err);
    }
  });

program
  .command('cleanup')
  .description('Delete tasks created more than N days ago')
  .option('-d, --days <days>', 'Age threshold in days', parsePositiveInt, 30)
  .action(async (opts: { days: number }) => {
    try {
      const config = loadConfig();
      const context = createAppContext(config);
      try {
        const cutoff = new Date(Date.now() - opts.days * 24 * 60 * 60 * 1000);
        const removed = await context.service.purgeCreatedBefore(cutoff);
        log.info(`Removed ${removed} task(s) created before ${cutoff.toISOString()}`);
        if (context.cacheBackend instanceof SqliteCacheBackend) {
          log.info(`Purged ${context.cacheBackend.purgeExpired()} expired cache entries`);
        }
      } finally {
        await closeAppContext(context);
      }
    } catch (err: unknown) {
      fail(err);
    }
  });

program.parseAsync().catch(fail);

