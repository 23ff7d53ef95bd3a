/**
 * Task creation: roots and numbered sub-tasks.
 */

import type { z } from 'zod';
import type { ProjectStore } from '../../store/project-registry.js';
import type { TaskRepository } from '../../store/task-store.js';
import type { Task } from '../../types/task.js';
import { ExitCode } from '../../types/exit-codes.js';
import { LedgerError } from '../errors.js';
import { createTaskDraft } from './draft.js';
import { formatTaskNumber, parseTaskNumber } from './numbering.js';
import {
  addRootTaskSchema,
  addSubTaskSchema,
  addSubTasksSchema,
  parseInput,
} from './schemas.js';

export type AddRootTaskOptions = z.input<typeof addRootTaskSchema>;
export type AddSubTaskOptions = z.input<typeof addSubTaskSchema>;
export type AddSubTasksOptions = z.input<typeof addSubTasksSchema>;

/**
 * Get a live root task, failing when the id is unknown or not a root.
 */
export function requireRoot(repo: TaskRepository, rootId: number): Task {
  const root = repo.getById(rootId);
  if (!root || root.parentId !== 0) {
    throw new LedgerError(ExitCode.NOT_FOUND, `Root task not found: ${rootId}`, {
      fix: 'List roots with listRoots() and pass one of their ids',
    });
  }
  return root;
}

/**
 * Walk the partial numbers of `levels` down from the root, creating each
 * missing ancestor as "Task <number>". Returns the deepest ancestor.
 */
export function ensureAncestors(repo: TaskRepository, root: Task, levels: readonly string[]): Task {
  let current = root;
  for (let depth = 1; depth <= levels.length; depth++) {
    const partial = formatTaskNumber(levels.slice(0, depth));
    const existing = repo.getDescendantByNumber(root.id, partial);
    current = existing ?? repo.insert(createTaskDraft({
      name: `Task ${partial}`,
      number: partial,
      rootId: root.id,
      parentId: current.id,
    }));
  }
  return current;
}

/** Insert one numbered sub-task under a root, filling in missing ancestors. */
function insertNumbered(
  repo: TaskRepository,
  root: Task,
  subTask: { number: string | number; name: string; description: string },
): Task {
  const levels = parseTaskNumber(subTask.number);
  const parent = ensureAncestors(repo, root, levels.slice(0, -1));
  return repo.insert(createTaskDraft({
    name: subTask.name,
    description: subTask.description,
    number: formatTaskNumber(levels),
    rootId: root.id,
    parentId: parent.id,
  }));
}

/** Create a new root task. */
export function addRootTask(options: AddRootTaskOptions, store: ProjectStore): Task {
  const input = parseInput(addRootTaskSchema, options, 'addRootTask');
  return store.transaction(() =>
    store.tasks.insert(createTaskDraft({
      name: input.name,
      description: input.description,
      number: input.number,
      plannedStartTime: input.plannedStartTime ?? null,
      plannedFinishTime: input.plannedFinishTime ?? null,
    })),
  );
}

/** Add one sub-task at a dotted number under a root. */
export function addSubTask(options: AddSubTaskOptions, store: ProjectStore): Task {
  const input = parseInput(addSubTaskSchema, options, 'addSubTask');
  return store.transaction(() => {
    const root = requireRoot(store.tasks, input.rootId);
    return insertNumbered(store.tasks, root, input);
  });
}

/** Add several numbered sub-tasks under a root, all or none. */
export function addSubTasks(options: AddSubTasksOptions, store: ProjectStore): Task[] {
  const input = parseInput(addSubTasksSchema, options, 'addSubTasks');
  return store.transaction(() => {
    const root = requireRoot(store.tasks, input.rootId);
    return input.subTasks.map(subTask => insertNumbered(store.tasks, root, subTask));
  });
}
