/**
 * Task domain types.
 *
 * A project holds a forest of task trees. Each root decomposes into
 * dotted-number sub-tasks; leaves carry execution state and progress,
 * group tasks derive theirs from their children.
 */

import type { TaskStatus } from '../store/status-registry.js';

export type { TaskStatus };

/** A persisted task row plus its storage-assigned id. */
export interface Task {
  id: number;
  name: string;
  description: string;
  status: TaskStatus;
  /** Optimistic-lock counter, starts at 1. */
  version: number;
  /** Dotted-decimal position within the root's tree, e.g. "1.2.3". */
  number: string;
  isLeaf: boolean;
  /** Id of the top-most ancestor; equals `id` for a root. */
  rootId: number;
  /** Id of the immediate parent; 0 for a root. */
  parentId: number;
  createdTime: Date;
  updatedTime: Date | null;
  startedTime: Date | null;
  finishedTime: Date | null;
  plannedStartTime: Date | null;
  plannedFinishTime: Date | null;
  /** Fraction complete in [0, 1]. */
  progress: number;
  deleted: boolean;
}

/** A task that has not been stored yet (no id). */
export type NewTask = Omit<Task, 'id'>;

/** Fields a caller may seed when drafting a new task. */
export type TaskInit = Partial<NewTask> & { name: string };

/** Fields writable through the plain update path. */
export type WritableTaskField = Exclude<keyof Task, 'id' | 'version' | 'updatedTime'>;

/**
 * Typed update request. `undefined` leaves a field untouched,
 * `null` clears a nullable timestamp.
 */
export type TaskPatch = Partial<Pick<Task, WritableTaskField>>;

/** One node of a nested task outline for bulk insertion. */
export interface TaskNode {
  name: string;
  description?: string;
  /** Explicit number; derived from the position in the tree when omitted. */
  number?: string;
  plannedStartTime?: Date | string;
  plannedFinishTime?: Date | string;
  children?: TaskNode[];
}

/** A task node after input validation. */
export interface ParsedTaskNode {
  name: string;
  description: string;
  number?: string;
  plannedStartTime?: Date;
  plannedFinishTime?: Date;
  children: ParsedTaskNode[];
}

/** A sub-task addressed by its dotted number under a root. */
export interface NumberedSubTask {
  number: string | number;
  name: string;
  description?: string;
}
