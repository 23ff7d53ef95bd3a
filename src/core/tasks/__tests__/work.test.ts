/**
 * Tests for execution state: start, finish, progress and work selection.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { finishLeafTask, startLeafTask, startOrResume, updateTaskProgress } from '../work.js';
import { addRootTask, addSubTasks } from '../add.js';
import { getTask } from '../list.js';
import { createMemoryStore } from '../../../store/project-registry.js';
import type { ProjectStore } from '../../../store/project-registry.js';
import type { Task } from '../../../types/task.js';
import { LedgerError } from '../../errors.js';
import { ExitCode } from '../../../types/exit-codes.js';

function codeOf(fn: () => unknown): ExitCode | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof LedgerError) return err.code;
    throw err;
  }
  return undefined;
}

let store: ProjectStore;
let root: Task;
let leaves: Task[];

describe('task work', () => {
  beforeEach(() => {
    store = createMemoryStore();
    root = addRootTask({ name: 'Root' }, store);
    leaves = addSubTasks({
      rootId: root.id,
      subTasks: [
        { number: '1', name: 'First' },
        { number: '2', name: 'Second' },
      ],
    }, store);
  });

  afterEach(() => {
    store.close();
  });

  function leaf(index: number): Task {
    const task = leaves[index];
    if (!task) throw new Error(`no leaf at ${index}`);
    return task;
  }

  it('starts and finishes leaves, moving the root along', () => {
    const started = startLeafTask({ taskId: leaf(0).id }, store);
    expect(started.status).toBe('started');
    expect(started.startedTime).not.toBeNull();
    expect(getTask({ taskId: root.id }, store).status).toBe('started');

    finishLeafTask({ taskId: leaf(0).id }, store);
    expect(getTask({ taskId: root.id }, store).status).toBe('started');

    startLeafTask({ taskId: leaf(1).id }, store);
    const finished = finishLeafTask({ taskId: leaf(1).id }, store);
    expect(finished.finishedTime).not.toBeNull();
    expect(getTask({ taskId: root.id }, store).status).toBe('finished');
  });

  it('refuses to start a group task', () => {
    expect(codeOf(() => startLeafTask({ taskId: root.id }, store))).toBe(ExitCode.PRECONDITION_FAILED);
  });

  it('refuses to finish a task that never started', () => {
    expect(codeOf(() => finishLeafTask({ taskId: leaf(0).id }, store))).toBe(ExitCode.PRECONDITION_FAILED);
  });

  it('records progress and averages it upward', () => {
    updateTaskProgress({ taskId: leaf(0).id, progress: 0.3 }, store);
    expect(getTask({ taskId: root.id }, store).progress).toBeCloseTo(0.15);

    const updated = updateTaskProgress({ taskId: leaf(1).id, progress: 0.7 }, store);
    expect(updated.progress).toBe(0.7);
    expect(getTask({ taskId: root.id }, store).progress).toBeCloseTo(0.5);
  });

  it('rejects progress out of range', () => {
    expect(codeOf(() => updateTaskProgress({ taskId: leaf(0).id, progress: 2 }, store)))
      .toBe(ExitCode.PRECONDITION_FAILED);
  });

  it('hands out leaves until none are left', () => {
    expect(startOrResume({ rootId: root.id }, store)?.name).toBe('First');
    expect(startOrResume({ rootId: root.id }, store)?.name).toBe('First');

    finishLeafTask({ taskId: leaf(0).id }, store);
    expect(startOrResume({ rootId: root.id }, store)?.name).toBe('Second');

    finishLeafTask({ taskId: leaf(1).id }, store);
    expect(startOrResume({ rootId: root.id }, store)).toBeNull();
  });

  it('starts a childless root itself', () => {
    const solo = addRootTask({ name: 'Solo' }, store);
    expect(startOrResume({ rootId: solo.id }, store)?.status).toBe('started');
  });

  it('requires a root for work selection', () => {
    expect(codeOf(() => startOrResume({ rootId: leaf(0).id }, store))).toBe(ExitCode.NOT_FOUND);
  });
});
