/**
 * CLI helpers: argument parsing and error handling.
 */

import { Priority, errorMessage } from '@tasktrack/core';
import { ApiError } from './api-client.js';
import * as out from './output.js';

/**
 * Parse a priority argument. Accepts names, digits and p-prefixed digits.
 */
export function parsePriorityArg(level: string): Priority | null {
  switch (level.toLowerCase()) {
    case 'low': case '1': case 'p1': return Priority.Low;
    case 'medium': case '2': case 'p2': return Priority.Medium;
    case 'high': case '3': case 'p3': return Priority.High;
    default: return null;
  }
}

export function parseTaskIdArg(raw: string): number {
  const id = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(id) || id < 1) {
    throw new Error(`Invalid task id: ${raw}`);
  }
  return id;
}

/** --completed / --pending to a filter value; neither means no filter */
export function completionFilter(completed: boolean | undefined, pending: boolean | undefined): boolean | undefined {
  if (completed && pending) {
    throw new Error('Cannot use both --completed and --pending at the same time');
  }
  if (completed) return true;
  if (pending) return false;
  return undefined;
}

/**
 * Items of an import file: a JSON array of tasks, or an object with a `tasks` array.
 */
export function parseImportFile(content: string): unknown[] {
  let value: unknown;
  try {
    value = JSON.parse(content);
  } catch {
    throw new Error('Import file is not valid JSON');
  }
  if (Array.isArray(value)) return value;
  if (typeof value === 'object' && value !== null && 'tasks' in value && Array.isArray(value.tasks)) {
    return value.tasks;
  }
  throw new Error('Import file must hold an array of tasks or an object with a "tasks" array');
}

/**
 * Run a command action, printing failures instead of throwing.
 */
export async function $try(fn: () => Promise<void> | void): Promise<void> {
  try {
    await fn();
  } catch (err: unknown) {
    process.exitCode = 1;
    if (err instanceof ApiError) {
      out.error(err.message);
      for (const detail of err.details) {
        out.error(`  ${detail.field}: ${detail.message}`);
      }
      return;
    }
    out.error(errorMessage(err));
  }
}
