/**
 * Process lifecycle: listen, shut down on signals, and fan out to worker
 * processes when WEB_CONCURRENCY > 1.
 */
import cluster from 'node:cluster';
import { createServer } from 'node:http';
import type { Server } from 'node:http';
import { ConfigError, closeDb, createDb, errorMessage, getLogger } from '@tasktrack/core';
import type { AppConfig } from '@tasktrack/core';
import { createApp } from './app.js';
import { closeAppContext, createAppContext } from './context.js';
import { toNodeListener } from './http/node-adapter.js';

const log = getLogger('Server');

const SHUTDOWN_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

export interface RunningServer {
  server: Server;
  close(): Promise<void>;
}

/** Build the app, listen, and return a handle that tears everything down */
export async function startServer(config: AppConfig): Promise<RunningServer> {
  const context = createAppContext(config);
  const app = createApp(context);
  const server = createServer(toNodeListener(app, { maxBodyBytes: config.server.maxBodyBytes }));

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.server.port, config.server.host, () => {
      server.off('error', reject);
      resolve();
    });
  });
  log.info(`Listening on http://${config.server.host}:${config.server.port}${config.server.apiPrefix}`, {
    pid: process.pid,
  });

  let closing: Promise<void> | null = null;
  const close = (): Promise<void> => {
    closing ??= new Promise<void>((resolve, reject) => {
      server.close(err => (err ? reject(err) : resolve()));
      server.closeIdleConnections();
    }).finally(() => closeAppContext(context));
    return closing;
  };

  return { server, close };
}

/** Apply the schema once, then exit; used by `migrate` and before forking */
export function migrate(config: AppConfig): void {
  const db = createDb(config.database.path);
  closeDb(db);
  log.info('Schema is up to date', { database: config.database.path });
}

function onShutdownSignal(handler: (signal: string) => Promise<void>): void {
  for (const signal of SHUTDOWN_SIGNALS) {
    process.once(signal, () => {
      handler(signal).then(
        () => process.exit(0),
        (err: unknown) => {
          log.error('Shutdown failed', err instanceof Error ? err : { error: errorMessage(err) });
          process.exit(1);
        },
      );
    });
  }
}

async function serveSingle(config: AppConfig): Promise<void> {
  const running = await startServer(config);
  onShutdownSignal(async signal => {
    log.info(`Received ${signal}, shutting down`);
    await running.close();
  });
}

function servePrimary(config: AppConfig): void {
  if (config.cache.backend === 'memory') {
    throw new ConfigError('CACHE_BACKEND=memory cannot be shared across workers; use sqlite or set WEB_CONCURRENCY=1');
  }
  migrate(config);

  let shuttingDown = false;
  for (let i = 0; i < config.server.workers; i++) cluster.fork();

  cluster.on('exit', (worker, code, signal) => {
    if (shuttingDown) return;
    log.warn('Worker exited, starting a replacement', { pid: worker.process.pid, code, signal });
    cluster.fork();
  });

  onShutdownSignal(async signal => {
    shuttingDown = true;
    log.info(`Received ${signal}, stopping ${config.server.workers} workers`);
    const workers = Object.values(cluster.workers ?? {});
    await Promise.all(workers.map(worker => new Promise<void>(resolve => {
      if (!worker || worker.isDead()) {
        resolve();
        return;
      }
      worker.once('exit', () => resolve());
      worker.process.kill('SIGTERM');
    })));
  });
}

/**
 * Entry point for `serve`. With more than one worker the primary only
 * supervises; each worker runs its own server on the shared port.
 */
export async function serve(config: AppConfig): Promise<void> {
  if (config.server.workers <= 1) {
    await serveSingle(config);
    return;
  }
  if (cluster.isPrimary) {
    servePrimary(config);
    return;
  }
  await serveSingle(config);
}
