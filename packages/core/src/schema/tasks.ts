import { sqliteTable, text, integer, index, uniqueIndex } from 'drizzle-orm/sqlite-core';
import type { TaskStatus } from '../types/task-status.js';
import type { Priority } from '../types/priority.js';

export const tasks = sqliteTable('tasks', {
  id: text('id').primaryKey(),
  title: text('title').notNull(),
  /** Lower-cased title; titles are unique regardless of case */
  titleKey: text('title_key').notNull(),
  description: text('description'),
  status: text('status').$type<TaskStatus>().notNull().default('pending'),
  priority: text('priority').$type<Priority>().notNull().default('medium'),
  dueDate: text('due_date'),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
  /** Insertion order. Listing uses ORDER BY position ASC */
  position: integer('position').notNull().default(0),
}, (table) => [
  uniqueIndex('idx_tasks_title_key').on(table.titleKey),
  index('idx_tasks_status').on(table.status),
  index('idx_tasks_priority').on(table.priority),
  index('idx_tasks_position').on(table.position),
]);

export type TaskRow = typeof tasks.$inferSelect;
export type NewTaskRow = typeof tasks.$inferInsert;
