/**
 * Task entity helpers: drafting new tasks and the derived planned duration.
 */

import type { NewTask, Task, TaskInit } from '../../types/task.js';

/** A new, unstored task with every default filled in. */
export function createTaskDraft(init: TaskInit, now: Date = new Date()): NewTask {
  return {
    description: '',
    status: 'created',
    version: 1,
    number: '',
    isLeaf: true,
    rootId: 0,
    parentId: 0,
    createdTime: now,
    updatedTime: now,
    startedTime: null,
    finishedTime: null,
    plannedStartTime: null,
    plannedFinishTime: null,
    progress: 0,
    deleted: false,
    ...init,
  };
}

/** Whether a task sits at the top of its tree. */
export function isRoot(task: Pick<Task, 'parentId'>): boolean {
  return task.parentId === 0;
}

/** Planned duration in seconds, or null unless both planned times are set. */
export function getPlannedDuration(task: Pick<NewTask, 'plannedStartTime' | 'plannedFinishTime'>): number | null {
  if (task.plannedStartTime && task.plannedFinishTime) {
    return (task.plannedFinishTime.getTime() - task.plannedStartTime.getTime()) / 1000;
  }
  return null;
}

/**
 * Set the planned finish to start + `seconds` (mutates).
 * No-op without a planned start or with a zero duration.
 */
export function setPlannedDuration(
  task: Pick<NewTask, 'plannedStartTime' | 'plannedFinishTime'>,
  seconds: number,
): void {
  if (task.plannedStartTime && seconds) {
    task.plannedFinishTime = new Date(task.plannedStartTime.getTime() + seconds * 1000);
  }
}
