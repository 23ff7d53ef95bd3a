/**
 * Task status registry: the status enum, its transition table and the
 * rule that derives a group task's status from its children.
 *
 * Dependency direction:
 *   status-registry.ts → schema.ts, types/task.ts, task-store.ts
 */

export const TASK_STATUSES = ['created', 'started', 'finished'] as const;

export type TaskStatus = typeof TASK_STATUSES[number];

/**
 * Allowed forward moves. `created → finished` skips the start;
 * nothing ever moves backwards.
 */
export const TASK_STATUS_TRANSITIONS: Readonly<Record<TaskStatus, readonly TaskStatus[]>> = {
  created: ['started', 'finished'],
  started: ['finished'],
  finished: [],
};

export const TERMINAL_TASK_STATUSES: ReadonlySet<TaskStatus> = new Set(['finished']);

/** Check if a string is a known task status. */
export function isValidStatus(value: string): value is TaskStatus {
  return (TASK_STATUSES as readonly string[]).includes(value);
}

/** Check whether `to` is reachable from `from` in one step. */
export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TASK_STATUS_TRANSITIONS[from].includes(to);
}

/**
 * Status a group task should hold given its live children.
 * Returns null when the children imply no change (none started yet, or no children).
 */
export function deriveParentStatus(children: ReadonlyArray<{ status: TaskStatus }>): TaskStatus | null {
  if (children.length === 0) return null;
  if (children.every(child => child.status === 'finished')) return 'finished';
  if (children.some(child => child.status === 'started' || child.status === 'finished')) return 'started';
  return null;
}
