/**
 * Read-only task queries.
 */

import type { z } from 'zod';
import type { ProjectStore } from '../../store/project-registry.js';
import type { Task } from '../../types/task.js';
import { ExitCode } from '../../types/exit-codes.js';
import { LedgerError } from '../errors.js';
import { requireRoot } from './add.js';
import { findRootsSchema, parseInput, rootRefSchema, taskRefSchema } from './schemas.js';

export type TaskRef = z.input<typeof taskRefSchema>;
export type RootRef = z.input<typeof rootRefSchema>;
export type FindRootsOptions = z.input<typeof findRootsSchema>;

/** Get one task. */
export function getTask(options: TaskRef, store: ProjectStore): Task {
  const { taskId } = parseInput(taskRefSchema, options, 'getTask');
  const task = store.tasks.getById(taskId);
  if (!task) {
    throw new LedgerError(ExitCode.NOT_FOUND, `Task not found: ${taskId}`);
  }
  return task;
}

/** All live roots. */
export function listRoots(store: ProjectStore): Task[] {
  return store.tasks.listRoots();
}

/** Roots whose name starts with a prefix (case-insensitive). */
export function findRoots(options: FindRootsOptions, store: ProjectStore): Task[] {
  const { prefix } = parseInput(findRootsSchema, options, 'findRoots');
  return store.tasks.listRootsByName(prefix);
}

/** Every live task of a tree except the root itself. */
export function listSubTasks(options: RootRef, store: ProjectStore): Task[] {
  const { rootId } = parseInput(rootRefSchema, options, 'listSubTasks');
  const root = requireRoot(store.tasks, rootId);
  return store.tasks.listByRootId(root.id).filter(task => task.parentId !== 0);
}

/** Live leaves of a tree. */
export function listLeafTasks(options: RootRef, store: ProjectStore): Task[] {
  const { rootId } = parseInput(rootRefSchema, options, 'listLeafTasks');
  return store.tasks.listLeaves(rootId);
}
