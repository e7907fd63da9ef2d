import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import type { TaskJson, TaskStats } from '@tasktrack/core';
import { formatDueDate, formatStats, formatTaskLine } from '../src/output.js';

const TODAY = new Date(2025, 3, 15, 9, 30);

beforeAll(() => {
  chalk.level = 0;
});

describe('formatDueDate', () => {
  it('is empty without a due date', () => {
    expect(formatDueDate(null)).toBe('');
  });

  it('labels dates relative to today', () => {
    expect(formatDueDate('2025-04-13', false, null, TODAY)).toBe('  OVERDUE (2d)');
    expect(formatDueDate('2025-04-15', false, null, TODAY)).toBe('  Due: Today');
    expect(formatDueDate('2025-04-16', false, null, TODAY)).toBe('  Due: Tomorrow');
    expect(formatDueDate('2025-04-18', false, null, TODAY)).toBe('  Due: Friday');
    expect(formatDueDate('2025-04-30', false, null, TODAY)).toBe('  Due: Apr 30');
  });

  it('freezes the label of a completed task', () => {
    expect(formatDueDate('2025-04-10', true, '2025-04-12T10:00:00', TODAY)).toBe('  Completed 2d late');
    expect(formatDueDate('2025-04-10', true, '2025-04-09T10:00:00', TODAY)).toBe('  Due: Apr 10');
  });
});

describe('formatTaskLine', () => {
  it('shows id, priority, checkbox, title and due label', () => {
    const task: TaskJson = {
      id: 7,
      title: 'Buy milk',
      description: null,
      priority: 2,
      completed: false,
      due_date: '2025-04-15',
      created_at: '2025-04-10T09:00:00.000Z',
      updated_at: '2025-04-10T09:00:00.000Z',
      completed_at: null,
    };
    expect(formatTaskLine(task, TODAY)).toBe('(7) >>  [ ] Buy milk  Due: Today');
  });
});

describe('formatStats', () => {
  const stats: TaskStats = {
    total: 4,
    completed: 1,
    pending: 3,
    completionRate: 25,
    priorityBreakdown: { 1: 2, 2: 1, 3: 1 },
    createdToday: 2,
    generatedAt: '2025-04-15T09:30:00.000Z',
  };

  it('renders counts and the priority breakdown', () => {
    expect(formatStats(stats)).toEqual([
      'Total:       4',
      'Completed:   1 (25%)',
      'Pending:     3',
      'Today:       2 created',
      'Priority:    High 1, Medium 1, Low 2',
    ]);
  });

  it('flags placeholder numbers', () => {
    expect(formatStats({ ...stats, degraded: true }).at(-1)).toBe('Statistics are unavailable; showing placeholders');
  });
});
