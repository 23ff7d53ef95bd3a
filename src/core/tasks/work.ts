/**
 * Execution state: starting, finishing, progress and work selection.
 */

import type { z } from 'zod';
import type { ProjectStore } from '../../store/project-registry.js';
import type { Task } from '../../types/task.js';
import { requireRoot } from './add.js';
import type { RootRef, TaskRef } from './list.js';
import {
  parseInput,
  rootRefSchema,
  taskRefSchema,
  updateProgressSchema,
} from './schemas.js';

export type UpdateTaskProgressOptions = z.input<typeof updateProgressSchema>;

/** Start a leaf task (created → started). */
export function startLeafTask(options: TaskRef, store: ProjectStore): Task {
  const { taskId } = parseInput(taskRefSchema, options, 'startLeafTask');
  return store.transaction(() => store.tasks.startById(taskId));
}

/** Finish a leaf task (started → finished). */
export function finishLeafTask(options: TaskRef, store: ProjectStore): Task {
  const { taskId } = parseInput(taskRefSchema, options, 'finishLeafTask');
  return store.transaction(() => store.tasks.finishById(taskId));
}

/** Record progress on a task; ancestors are re-averaged. */
export function updateTaskProgress(options: UpdateTaskProgressOptions, store: ProjectStore): Task {
  const { taskId, progress } = parseInput(updateProgressSchema, options, 'updateTaskProgress');
  return store.transaction(() => store.tasks.updateProgress(taskId, progress));
}

/**
 * Hand out the next leaf of a tree: a started one first, else the first
 * created one (which gets started). Null when nothing is left.
 */
export function startOrResume(options: RootRef, store: ProjectStore): Task | null {
  const { rootId } = parseInput(rootRefSchema, options, 'startOrResume');
  return store.transaction(() => {
    const root = requireRoot(store.tasks, rootId);
    return store.tasks.startOrResume(root.id);
  });
}
