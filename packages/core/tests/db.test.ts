import { describe, it, expect, beforeEach } from 'vitest';
import { CREATE_SCHEMA_SQL, createTestDb, getRawDb, pingDb, closeDb, withRetry, type TaskDb } from '../src/db.js';

let db: TaskDb;

beforeEach(() => {
  db = createTestDb();
});

describe('createTestDb', () => {
  it('creates the tasks table', () => {
    const row: unknown = getRawDb(db)
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'tasks'")
      .get();
    expect(row).toEqual({ name: 'tasks' });
  });

  it('is safe to apply the schema twice', () => {
    expect(() => getRawDb(db).exec(CREATE_SCHEMA_SQL)).not.toThrow();
  });

  it('rejects a priority outside 1..3', () => {
    const insert = getRawDb(db).prepare(
      "INSERT INTO tasks (title, priority, completed, created_at, updated_at) VALUES ('x', 4, 0, 'a', 'a')",
    );
    expect(() => insert.run()).toThrow(/CHECK constraint failed/);
  });

  it('rejects completed without completed_at', () => {
    const insert = getRawDb(db).prepare(
      "INSERT INTO tasks (title, priority, completed, created_at, updated_at) VALUES ('x', 1, 1, 'a', 'a')",
    );
    expect(() => insert.run()).toThrow(/CHECK constraint failed/);
  });
});

describe('pingDb / closeDb', () => {
  it('pings an open database and fails once closed', () => {
    expect(() => pingDb(db)).not.toThrow();
    closeDb(db);
    expect(() => pingDb(db)).toThrow();
  });

  it('closing twice is harmless', () => {
    closeDb(db);
    expect(() => closeDb(db)).not.toThrow();
  });
});

describe('withRetry', () => {
  function busyError(): Error {
    return Object.assign(new Error('database is locked'), { code: 'SQLITE_BUSY' });
  }

  it('retries SQLITE_BUSY and returns the eventual result', async () => {
    let attempts = 0;
    const result = await withRetry(() => {
      attempts++;
      if (attempts < 2) throw busyError();
      return 'done';
    });
    expect(result).toBe('done');
    expect(attempts).toBe(2);
  });

  it('does not retry other errors', async () => {
    let attempts = 0;
    await expect(withRetry(() => {
      attempts++;
      throw new Error('syntax error');
    })).rejects.toThrow('syntax error');
    expect(attempts).toBe(1);
  });

  it('gives up after the last attempt', async () => {
    let attempts = 0;
    await expect(withRetry(() => {
      attempts++;
      throw busyError();
    }, 2)).rejects.toThrow('database is locked');
    expect(attempts).toBe(2);
  });
});
