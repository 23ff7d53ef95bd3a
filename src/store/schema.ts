/**
 * Drizzle ORM schema for taskledger.sqlite (SQLite via better-sqlite3).
 *
 * Tables: tasks, schema_meta
 *
 * Timestamps are ISO-8601 text; booleans are stored as 0/1 integers.
 */

import {
  sqliteTable,
  text,
  integer,
  real,
  index,
} from 'drizzle-orm/sqlite-core';
import { TASK_STATUSES } from './status-registry.js';

export { TASK_STATUSES, type TaskStatus, isValidStatus } from './status-registry.js';

// === TASKS TABLE ===

export const tasks = sqliteTable('tasks', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull(),
  description: text('description').default(''),
  status: text('status', { enum: TASK_STATUSES }).default('created'),
  version: integer('version').default(1),
  number: text('number').notNull(),
  isLeaf: integer('is_leaf', { mode: 'boolean' }).default(false),
  parentId: integer('parent_id').notNull().default(0),
  rootId: integer('root_id').notNull().default(0),

  // Timestamps
  createdTime: text('created_time').notNull(),
  updatedTime: text('updated_time'),
  startedTime: text('started_time'),
  finishedTime: text('finished_time'),
  plannedStartTime: text('planned_start_time'),
  plannedFinishTime: text('planned_finish_time'),

  progress: real('progress').notNull().default(0),
  deleted: integer('deleted', { mode: 'boolean' }).notNull().default(false),
}, (table) => [
  index('idx_tasks_parent_id').on(table.parentId, table.deleted),
  index('idx_tasks_root_id_number').on(table.rootId, table.number, table.deleted),
  index('idx_tasks_deleted').on(table.deleted),
  index('idx_tasks_updated_time').on(table.updatedTime),
]);

// === SCHEMA META ===

export const schemaMeta = sqliteTable('schema_meta', {
  key: text('key').primaryKey(),
  value: text('value').notNull(),
});

// === TYPE EXPORTS ===

export type TaskRow = typeof tasks.$inferSelect;
export type NewTaskRow = typeof tasks.$inferInsert;
export type SchemaMetaRow = typeof schemaMeta.$inferSelect;
