/**
 * Task deletion: soft delete of a subtree or of everything, and the
 * physical purge used for a full project reset.
 */

import type { ProjectStore } from '../../store/project-registry.js';
import type { TaskRef } from './list.js';
import { parseInput, taskRefSchema } from './schemas.js';

/** Result of a soft delete. */
export interface DeleteTaskResult {
  /** Rows newly marked deleted. */
  deleted: number;
}

/** Soft-delete a task and every descendant. */
export function deleteTask(options: TaskRef, store: ProjectStore): DeleteTaskResult {
  const { taskId } = parseInput(taskRefSchema, options, 'deleteTask');
  return { deleted: store.transaction(() => store.tasks.deleteById(taskId)) };
}

/** Soft-delete every task of the project. */
export function deleteAllTasks(store: ProjectStore): DeleteTaskResult {
  return { deleted: store.transaction(() => store.tasks.deleteAll()) };
}

/** Purge every task and restart id generation at 1. */
export function clearAllTasks(store: ProjectStore): void {
  store.transaction(() => store.tasks.clear());
}
