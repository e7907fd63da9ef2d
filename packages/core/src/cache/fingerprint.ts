import { createHash } from 'node:crypto';
import type { TaskFilter } from '../types/task.js';

/**
 * Canonical text of a list query: defined fields only, sorted by name, so
 * `{priority, search}` and `{search, priority}` encode identically.
 */
export function canonicalFilter(filter: TaskFilter): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(filter)) {
    if (value === undefined) continue;
    parts.push(`${key}=${encodeURIComponent(String(value))}`);
  }
  return parts.sort().join('&');
}

/** Short, stable cache-key fragment for a list query */
export function fingerprint(filter: TaskFilter): string {
  return createHash('sha1').update(canonicalFilter(filter)).digest('hex');
}
