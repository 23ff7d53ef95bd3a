/**
 * Tests for task row <-> entity conversion.
 */

import { describe, it, expect } from 'vitest';
import { applyPatch, fromIso, patchToRow, rowToTask, taskToRow, toIsoOrNull } from '../converters.js';
import type { TaskRow } from '../schema.js';
import { createTaskDraft } from '../../core/tasks/draft.js';

const CREATED = new Date('2026-03-01T09:00:00.000Z');

function makeRow(overrides: Partial<TaskRow> = {}): TaskRow {
  return {
    id: 7,
    name: 'Write docs',
    description: null,
    status: null,
    version: null,
    number: '1.2',
    isLeaf: null,
    parentId: 3,
    rootId: 1,
    createdTime: CREATED.toISOString(),
    updatedTime: null,
    startedTime: '',
    finishedTime: null,
    plannedStartTime: '2026-03-02T00:00:00.000Z',
    plannedFinishTime: null,
    progress: 0.25,
    deleted: false,
    ...overrides,
  };
}

describe('converters', () => {
  it('fills defaults for nullable columns', () => {
    const task = rowToTask(makeRow());
    expect(task.description).toBe('');
    expect(task.status).toBe('created');
    expect(task.version).toBe(1);
    expect(task.isLeaf).toBe(false);
    expect(task.createdTime.getTime()).toBe(CREATED.getTime());
  });

  it('reads empty or missing timestamps as null', () => {
    const task = rowToTask(makeRow());
    expect(task.updatedTime).toBeNull();
    expect(task.startedTime).toBeNull();
    expect(task.plannedStartTime?.toISOString()).toBe('2026-03-02T00:00:00.000Z');
    expect(fromIso(undefined)).toBeNull();
  });

  it('serializes a draft to ISO text columns', () => {
    const row = taskToRow(createTaskDraft({ name: 'Draft', number: '4' }, CREATED));
    expect(row.createdTime).toBe('2026-03-01T09:00:00.000Z');
    expect(row.updatedTime).toBe('2026-03-01T09:00:00.000Z');
    expect(row.startedTime).toBeNull();
    expect(row.isLeaf).toBe(true);
    expect(row.status).toBe('created');
  });

  it('writes only the fields a patch names', () => {
    expect(patchToRow({ name: 'Renamed', finishedTime: null })).toEqual({
      name: 'Renamed',
      finishedTime: null,
    });
    expect(patchToRow({})).toEqual({});
    expect(toIsoOrNull(CREATED)).toBe('2026-03-01T09:00:00.000Z');
  });

  it('applies a patch to the entity', () => {
    const task = rowToTask(makeRow());
    applyPatch(task, { status: 'started', progress: 0.5 });
    expect(task.status).toBe('started');
    expect(task.progress).toBe(0.5);
    expect(task.name).toBe('Write docs');
  });
});
