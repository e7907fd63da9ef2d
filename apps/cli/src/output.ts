/**
 * chalk-based terminal output for tasks and stats.
 */

import chalk from 'chalk';
import { Priority, PriorityName } from '@tasktrack/core';
import type { TaskJson, TaskStats } from '@tasktrack/core';

const DAY_MS = 86_400_000;

// --- Formatting functions ---

export function formatCheckbox(completed: boolean): string {
  return completed ? chalk.green('[x]') : chalk.gray('[ ]');
}

export function formatPriority(priority: Priority): string {
  switch (priority) {
    case Priority.High: return chalk.red.bold('>>>');
    case Priority.Medium: return chalk.yellow('>> ');
    default: return chalk.blue('>  ');
  }
}

function localDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

/** yyyy-MM-dd as a local midnight, or null when malformed */
function parseDay(value: string): Date | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) return null;
  return new Date(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
}

function formatMonthDay(d: Date): string {
  return d.toLocaleDateString('en-US', { month: 'short', day: 'numeric' });
}

export function formatDueDate(
  dueDate: string | null,
  completed = false,
  completedAt: string | null = null,
  today: Date = new Date(),
): string {
  if (!dueDate) return '';
  const due = parseDay(dueDate);
  if (!due) return chalk.dim(`  Due: ${dueDate}`);

  // A completed task keeps the label it had when it was finished
  if (completed && completedAt) {
    const lateDays = Math.floor((localDay(new Date(completedAt)).getTime() - due.getTime()) / DAY_MS);
    return lateDays > 0
      ? chalk.dim(`  Completed ${lateDays}d late`)
      : chalk.dim(`  Due: ${formatMonthDay(due)}`);
  }

  const diff = Math.floor((due.getTime() - localDay(today).getTime()) / DAY_MS);
  if (diff < 0) return chalk.red(`  OVERDUE (${-diff}d)`);
  if (diff === 0) return chalk.yellow('  Due: Today');
  if (diff === 1) return chalk.dim('  Due: Tomorrow');
  if (diff < 7) return chalk.dim(`  Due: ${due.toLocaleDateString('en-US', { weekday: 'long' })}`);
  return chalk.dim(`  Due: ${formatMonthDay(due)}`);
}

export function formatTaskLine(task: TaskJson, today: Date = new Date()): string {
  const id = chalk.dim(`(${task.id})`);
  const due = formatDueDate(task.due_date, task.completed, task.completed_at, today);
  return `${id} ${formatPriority(task.priority)} ${formatCheckbox(task.completed)} ${chalk.bold(task.title)}${due}`;
}

// --- Result output ---

export function printTasks(tasks: readonly TaskJson[], emptyMessage: string): void {
  if (tasks.length === 0) {
    info(emptyMessage);
    return;
  }
  for (const task of tasks) {
    console.log(formatTaskLine(task));
  }
}

function stamp(iso: string): string {
  return iso.replace('T', ' ').slice(0, 16);
}

export function printTaskDetail(task: TaskJson): void {
  console.log(`${chalk.bold('ID:')}          ${task.id}`);
  console.log(`${chalk.bold('Title:')}       ${task.title}`);
  console.log(`${chalk.bold('Status:')}      ${formatCheckbox(task.completed)}`);
  console.log(`${chalk.bold('Priority:')}    ${PriorityName[task.priority]}`);
  console.log(`${chalk.bold('Due:')}         ${task.due_date ?? '-'}`);
  console.log(`${chalk.bold('Created:')}     ${stamp(task.created_at)}`);
  console.log(`${chalk.bold('Updated:')}     ${stamp(task.updated_at)}`);
  if (task.completed_at) {
    console.log(`${chalk.bold('Completed:')}   ${stamp(task.completed_at)}`);
  }
  if (task.description) {
    console.log(`${chalk.bold('Description:')}`);
    console.log(task.description);
  }
}

export function formatStats(stats: TaskStats): string[] {
  const lines = [
    `${chalk.bold('Total:')}       ${stats.total}`,
    `${chalk.bold('Completed:')}   ${stats.completed} (${stats.completionRate}%)`,
    `${chalk.bold('Pending:')}     ${stats.pending}`,
    `${chalk.bold('Today:')}       ${stats.createdToday} created`,
    `${chalk.bold('Priority:')}    ${PriorityName[Priority.High]} ${stats.priorityBreakdown[Priority.High]}, ` +
      `${PriorityName[Priority.Medium]} ${stats.priorityBreakdown[Priority.Medium]}, ` +
      `${PriorityName[Priority.Low]} ${stats.priorityBreakdown[Priority.Low]}`,
  ];
  if (stats.degraded) lines.push(chalk.yellow('Statistics are unavailable; showing placeholders'));
  return lines;
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}
