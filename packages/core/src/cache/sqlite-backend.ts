import Database from 'better-sqlite3';
import type { CacheBackend } from './cache-backend.js';
import { expiryFrom } from './cache-backend.js';
import { ensureParentDir } from '../db.js';

const CREATE_CACHE_SQL = `
CREATE TABLE IF NOT EXISTS cache_entries (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL,
    expires_at INTEGER
);

CREATE INDEX IF NOT EXISTS idx_cache_entries_expires_at ON cache_entries(expires_at);

CREATE TABLE IF NOT EXISTS cache_set_members (
    key TEXT NOT NULL,
    member TEXT NOT NULL,
    PRIMARY KEY (key, member)
);
`;

interface EntryRow {
  value: string;
  expires_at: number | null;
}

interface MemberRow {
  member: string;
}

export interface SqliteCacheOptions {
  now?: () => number;
  /** How long a writer waits on another process's lock before failing (ms) */
  busyTimeoutMs?: number;
}

/**
 * Key/value backend on its own SQLite file. Every worker process opens the
 * same file, which makes it the shared synchronization point for cached
 * content, registry sets and rate-limit counters.
 */
export class SqliteCacheBackend implements CacheBackend {
  readonly name = 'sqlite';
  private readonly sqlite: Database.Database;
  private readonly now: () => number;

  private readonly selectEntry: Database.Statement;
  private readonly upsertEntry: Database.Statement;
  private readonly deleteEntry: Database.Statement;
  private readonly deleteMembers: Database.Statement;
  private readonly insertMember: Database.Statement;
  private readonly deleteMember: Database.Statement;
  private readonly selectMembers: Database.Statement;
  private readonly deleteExpired: Database.Statement;

  constructor(path: string, options: SqliteCacheOptions = {}) {
    ensureParentDir(path);
    this.now = options.now ?? Date.now;
    this.sqlite = new Database(path);
    this.sqlite.pragma('journal_mode = WAL');
    this.sqlite.pragma('synchronous = NORMAL');
    this.sqlite.pragma(`busy_timeout = ${options.busyTimeoutMs ?? 100}`);
    this.sqlite.exec(CREATE_CACHE_SQL);

    this.selectEntry = this.sqlite.prepare('SELECT value, expires_at FROM cache_entries WHERE key = ?');
    this.upsertEntry = this.sqlite.prepare(
      `INSERT INTO cache_entries (key, value, expires_at) VALUES (?, ?, ?)
       ON CONFLICT(key) DO UPDATE SET value = excluded.value, expires_at = excluded.expires_at`,
    );
    this.deleteEntry = this.sqlite.prepare('DELETE FROM cache_entries WHERE key = ?');
    this.deleteMembers = this.sqlite.prepare('DELETE FROM cache_set_members WHERE key = ?');
    this.insertMember = this.sqlite.prepare('INSERT OR IGNORE INTO cache_set_members (key, member) VALUES (?, ?)');
    this.deleteMember = this.sqlite.prepare('DELETE FROM cache_set_members WHERE key = ? AND member = ?');
    this.selectMembers = this.sqlite.prepare('SELECT member FROM cache_set_members WHERE key = ? ORDER BY member');
    this.deleteExpired = this.sqlite.prepare('DELETE FROM cache_entries WHERE expires_at IS NOT NULL AND expires_at <= ?');
  }

  private readEntry(key: string): EntryRow | undefined {
    const row: unknown = this.selectEntry.get(key);
    return isEntryRow(row) ? row : undefined;
  }

  async get(key: string): Promise<string | null> {
    const row = this.readEntry(key);
    if (!row) return null;
    if (row.expires_at !== null && row.expires_at <= this.now()) {
      this.deleteEntry.run(key);
      return null;
    }
    return row.value;
  }

  async set(key: string, value: string, ttlMs: number | null): Promise<void> {
    this.upsertEntry.run(key, value, expiryFrom(this.now(), ttlMs));
  }

  async delete(keys: readonly string[]): Promise<void> {
    const run = this.sqlite.transaction((batch: readonly string[]) => {
      for (const key of batch) {
        this.deleteEntry.run(key);
        this.deleteMembers.run(key);
      }
    });
    run(keys);
  }

  async increment(key: string, ttlMs: number | null): Promise<number> {
    const bump = this.sqlite.transaction((): number => {
      const now = this.now();
      const row = this.readEntry(key);
      if (row !== undefined && (row.expires_at === null || row.expires_at > now)) {
        const next = (Number.parseInt(row.value, 10) || 0) + 1;
        this.upsertEntry.run(key, String(next), row.expires_at);
        return next;
      }
      this.upsertEntry.run(key, '1', expiryFrom(now, ttlMs));
      return 1;
    });
    // IMMEDIATE takes the write lock up front so two workers cannot read the same count
    return bump.immediate();
  }

  async addToSet(key: string, member: string): Promise<void> {
    this.insertMember.run(key, member);
  }

  async getSet(key: string): Promise<string[]> {
    const rows: unknown[] = this.selectMembers.all(key);
    return rows.filter(isMemberRow).map(row => row.member);
  }

  async removeFromSet(key: string, members: readonly string[]): Promise<void> {
    const run = this.sqlite.transaction((batch: readonly string[]) => {
      for (const member of batch) this.deleteMember.run(key, member);
    });
    run(members);
  }

  /** Drop expired entries; returns the number removed */
  purgeExpired(): number {
    return this.deleteExpired.run(this.now()).changes;
  }

  async ping(): Promise<void> {
    this.sqlite.prepare('SELECT 1').get();
  }

  async close(): Promise<void> {
    if (this.sqlite.open) this.sqlite.close();
  }
}

function isEntryRow(row: unknown): row is EntryRow {
  return typeof row === 'object' && row !== null
    && 'value' in row && typeof row.value === 'string'
    && 'expires_at' in row && (row.expires_at === null || typeof row.expires_at === 'number');
}

function isMemberRow(row: unknown): row is MemberRow {
  return typeof row === 'object' && row !== null && 'member' in row && typeof row.member === 'string';
}
