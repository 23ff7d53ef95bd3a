/**
 * Row <-> domain conversion for the tasks table.
 */

import type { TaskRow, NewTaskRow } from './schema.js';
import type { NewTask, Task, TaskPatch } from '../types/task.js';

/** Column values the plain update path may write. */
export type TaskRowUpdate = Partial<Omit<NewTaskRow, 'id' | 'version'>>;

/** Serialize a timestamp as ISO-8601 text. */
export function toIso(value: Date): string {
  return value.toISOString();
}

/** Serialize an optional timestamp; absent stays absent. */
export function toIsoOrNull(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

/** Parse stored ISO-8601 text; empty or missing reads back as null. */
export function fromIso(value: string | null | undefined): Date | null {
  return value ? new Date(value) : null;
}

/** Convert a database TaskRow to a domain Task object. */
export function rowToTask(row: TaskRow): Task {
  return {
    id: row.id,
    name: row.name,
    description: row.description ?? '',
    status: row.status ?? 'created',
    version: row.version ?? 1,
    number: row.number,
    isLeaf: row.isLeaf ?? false,
    rootId: row.rootId,
    parentId: row.parentId,
    createdTime: new Date(row.createdTime),
    updatedTime: fromIso(row.updatedTime),
    startedTime: fromIso(row.startedTime),
    finishedTime: fromIso(row.finishedTime),
    plannedStartTime: fromIso(row.plannedStartTime),
    plannedFinishTime: fromIso(row.plannedFinishTime),
    progress: row.progress,
    deleted: row.deleted,
  };
}

/** Convert a not-yet-stored task to an insert row (no id). */
export function taskToRow(task: NewTask): NewTaskRow {
  return {
    name: task.name,
    description: task.description,
    status: task.status,
    version: task.version,
    number: task.number,
    isLeaf: task.isLeaf,
    parentId: task.parentId,
    rootId: task.rootId,
    createdTime: toIso(task.createdTime),
    updatedTime: toIsoOrNull(task.updatedTime),
    startedTime: toIsoOrNull(task.startedTime),
    finishedTime: toIsoOrNull(task.finishedTime),
    plannedStartTime: toIsoOrNull(task.plannedStartTime),
    plannedFinishTime: toIsoOrNull(task.plannedFinishTime),
    progress: task.progress,
    deleted: task.deleted,
  };
}

/** Every writable field of a task, for a full write. */
export function fullPatch(task: Task): Required<TaskPatch> {
  return {
    name: task.name,
    description: task.description,
    status: task.status,
    number: task.number,
    isLeaf: task.isLeaf,
    rootId: task.rootId,
    parentId: task.parentId,
    createdTime: task.createdTime,
    startedTime: task.startedTime,
    finishedTime: task.finishedTime,
    plannedStartTime: task.plannedStartTime,
    plannedFinishTime: task.plannedFinishTime,
    progress: task.progress,
    deleted: task.deleted,
  };
}

/** Column values for the fields present in a patch. */
export function patchToRow(patch: TaskPatch): TaskRowUpdate {
  const row: TaskRowUpdate = {};
  if (patch.name !== undefined) row.name = patch.name;
  if (patch.description !== undefined) row.description = patch.description;
  if (patch.status !== undefined) row.status = patch.status;
  if (patch.number !== undefined) row.number = patch.number;
  if (patch.isLeaf !== undefined) row.isLeaf = patch.isLeaf;
  if (patch.rootId !== undefined) row.rootId = patch.rootId;
  if (patch.parentId !== undefined) row.parentId = patch.parentId;
  if (patch.createdTime !== undefined) row.createdTime = toIso(patch.createdTime);
  if (patch.startedTime !== undefined) row.startedTime = toIsoOrNull(patch.startedTime);
  if (patch.finishedTime !== undefined) row.finishedTime = toIsoOrNull(patch.finishedTime);
  if (patch.plannedStartTime !== undefined) row.plannedStartTime = toIsoOrNull(patch.plannedStartTime);
  if (patch.plannedFinishTime !== undefined) row.plannedFinishTime = toIsoOrNull(patch.plannedFinishTime);
  if (patch.progress !== undefined) row.progress = patch.progress;
  if (patch.deleted !== undefined) row.deleted = patch.deleted;
  return row;
}

/** Apply a patch to an in-memory task (mutates). */
export function applyPatch(task: Task, patch: TaskPatch): void {
  if (patch.name !== undefined) task.name = patch.name;
  if (patch.description !== undefined) task.description = patch.description;
  if (patch.status !== undefined) task.status = patch.status;
  if (patch.number !== undefined) task.number = patch.number;
  if (patch.isLeaf !== undefined) task.isLeaf = patch.isLeaf;
  if (patch.rootId !== undefined) task.rootId = patch.rootId;
  if (patch.parentId !== undefined) task.parentId = patch.parentId;
  if (patch.createdTime !== undefined) task.createdTime = patch.createdTime;
  if (patch.startedTime !== undefined) task.startedTime = patch.startedTime;
  if (patch.finishedTime !== undefined) task.finishedTime = patch.finishedTime;
  if (patch.plannedStartTime !== undefined) task.plannedStartTime = patch.plannedStartTime;
  if (patch.plannedFinishTime !== undefined) task.plannedFinishTime = patch.plannedFinishTime;
  if (patch.progress !== undefined) task.progress = patch.progress;
  if (patch.deleted !== undefined) task.deleted = patch.deleted;
}
