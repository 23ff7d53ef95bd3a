/**
 * Bulk insertion of a nested task outline.
 */

import type { z } from 'zod';
import type { ProjectStore } from '../../store/project-registry.js';
import type { TaskRepository } from '../../store/task-store.js';
import type { ParsedTaskNode, Task } from '../../types/task.js';
import { ExitCode } from '../../types/exit-codes.js';
import { LedgerError } from '../errors.js';
import { createTaskDraft } from './draft.js';
import { childNumber, formatTaskNumber, nextChildIndex, parseTaskNumber } from './numbering.js';
import { addTaskTreeSchema, parseInput } from './schemas.js';

export type AddTaskTreeOptions = z.input<typeof addTaskTreeSchema>;

/**
 * Stored number of a node: a root's explicit number is free-form, a
 * descendant's must be dotted decimal and is canonicalised.
 */
function nodeNumber(node: ParsedTaskNode, parent: Task | null, index: bigint): string {
  if (!parent) return node.number ?? '';
  if (node.number === undefined) return childNumber(parent, index);
  return formatTaskNumber(parseTaskNumber(node.number));
}

/**
 * Insert `node` under `parent` (or as a new root) and recurse into its
 * children. `isLeaf` comes from the outline, since nothing below the
 * node exists yet when it is written.
 */
function insertNode(
  repo: TaskRepository,
  node: ParsedTaskNode,
  parent: Task | null,
  index: bigint,
  created: Task[],
): void {
  const task = repo.insert(createTaskDraft({
    name: node.name,
    description: node.description,
    number: nodeNumber(node, parent, index),
    plannedStartTime: node.plannedStartTime ?? null,
    plannedFinishTime: node.plannedFinishTime ?? null,
    isLeaf: node.children.length === 0,
    rootId: parent?.rootId ?? 0,
    parentId: parent?.id ?? 0,
  }));
  created.push(task);

  node.children.forEach((child, i) => insertNode(repo, child, task, BigInt(i + 1), created));
}

/**
 * Create a whole task tree in one transaction, either as a new root or
 * attached under `parentId`. Returns the created tasks in pre-order, as stored.
 */
export function addTaskTree(options: AddTaskTreeOptions, store: ProjectStore): Task[] {
  const input = parseInput(addTaskTreeSchema, options, 'addTaskTree');
  const repo = store.tasks;

  return store.transaction(() => {
    let parent: Task | null = null;
    let index = 1n;
    if (input.parentId !== undefined) {
      parent = repo.getById(input.parentId);
      if (!parent) {
        throw new LedgerError(ExitCode.PARENT_NOT_FOUND, `Parent task not found: ${input.parentId}`);
      }
      index = nextChildIndex(repo.listByParentId(parent.id));
    }

    const created: Task[] = [];
    insertNode(repo, input.tree, parent, index, created);

    return created.map(task => repo.getById(task.id) ?? task);
  });
}
