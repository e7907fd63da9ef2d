import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema/index.js';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { mkdirSync } from 'node:fs';

export type TaskDb = BetterSQLite3Database<typeof schema> & { $client: Database.Database };

/** Returns the platform-appropriate data directory for the service */
export function getDefaultDataDir(): string {
  const platform = process.platform;

  if (platform === 'darwin') {
    return join(homedir(), 'Library', 'Application Support', 'tasktrack');
  }
  if (platform === 'win32') {
    return join(process.env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming'), 'tasktrack');
  }
  // Linux / other
  return join(process.env['XDG_DATA_HOME'] ?? join(homedir(), '.local', 'share'), 'tasktrack');
}

/** Returns the platform-appropriate default database path */
export function getDefaultDbPath(): string {
  return join(getDefaultDataDir(), 'tasktrack.db');
}

/** The raw SQL to create the schema from scratch (idempotent) */
export const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    description TEXT,
    priority INTEGER NOT NULL DEFAULT 1 CHECK (priority IN (1, 2, 3)),
    completed INTEGER NOT NULL DEFAULT 0,
    due_date TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    completed_at TEXT,
    owner_id INTEGER,
    CHECK ((completed = 1) = (completed_at IS NOT NULL))
);

CREATE INDEX IF NOT EXISTS idx_tasks_title ON tasks(title);
CREATE INDEX IF NOT EXISTS idx_tasks_completed ON tasks(completed);
CREATE INDEX IF NOT EXISTS idx_tasks_created_at ON tasks(created_at, id);
`;

/** Locale-independent Unicode lower-casing used for case-insensitive search */
export function casefold(value: string): string {
  return value.toLowerCase();
}

/** Create parent directories for a file-backed SQLite path */
export function ensureParentDir(path: string): void {
  if (path === ':memory:') return;
  mkdirSync(dirname(path), { recursive: true });
}

/**
 * Open the durable store and apply the schema before anything else touches it.
 * If no path is given, uses the platform default.
 * Pass ':memory:' for in-memory databases (tests).
 */
export function createDb(path?: string): TaskDb {
  const dbPath = path ?? getDefaultDbPath();
  ensureParentDir(dbPath);

  const sqlite = new Database(dbPath);

  // Pragmas are per connection
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('busy_timeout = 5000');

  // SQLite's LIKE folds ASCII only; search compares casefold() on both sides
  sqlite.function('casefold', { deterministic: true }, (value: unknown) =>
    typeof value === 'string' ? casefold(value) : null);

  sqlite.exec(CREATE_SCHEMA_SQL);

  return drizzle(sqlite, { schema });
}

/**
 * Create an in-memory database with schema applied. For tests.
 */
export function createTestDb(): TaskDb {
  return createDb(':memory:');
}

/** Sleep utility for retry logic */
function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function isBusyError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'SQLITE_BUSY';
}

/**
 * Retry wrapper with exponential backoff for SQLITE_BUSY errors.
 * Wraps write operations that may fail while another worker holds the write lock.
 */
export async function withRetry<T>(fn: () => T, maxRetries = 3): Promise<T> {
  for (let i = 0; i < maxRetries; i++) {
    try {
      return fn();
    } catch (err: unknown) {
      if (isBusyError(err) && i < maxRetries - 1) {
        await sleep(100 * Math.pow(2, i)); // 100ms, 200ms, 400ms
        continue;
      }
      throw err;
    }
  }
  throw new Error('withRetry: max retries exceeded');
}

/**
 * Get the raw Database instance from a Drizzle instance.
 * Useful for operations not supported by Drizzle (transactions, pragmas, raw exec).
 */
export function getRawDb(db: TaskDb): Database.Database {
  return db.$client;
}

/** Cheap round trip used by the readiness probe */
export function pingDb(db: TaskDb): void {
  getRawDb(db).prepare('SELECT 1').get();
}

export function closeDb(db: TaskDb): void {
  const raw = getRawDb(db);
  if (raw.open) raw.close();
}
