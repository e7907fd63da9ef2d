import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import type { Priority } from '../types/priority.js';

export const tasks = sqliteTable('tasks', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  title: text('title').notNull(),
  description: text('description'),
  priority: integer('priority').$type<Priority>().notNull().default(1),
  completed: integer('completed', { mode: 'boolean' }).notNull().default(false),
  /** Calendar day only, yyyy-MM-dd */
  dueDate: text('due_date'),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
  completedAt: text('completed_at'),
  ownerId: integer('owner_id'),
}, (table) => [
  index('idx_tasks_title').on(table.title),
  index('idx_tasks_completed').on(table.completed),
  index('idx_tasks_created_at').on(table.createdAt, table.id),
]);
