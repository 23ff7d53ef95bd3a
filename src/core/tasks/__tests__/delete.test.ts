/**
 * Tests for soft deletion and purge.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { clearAllTasks, deleteAllTasks, deleteTask } from '../delete.js';
import { addRootTask, addSubTasks } from '../add.js';
import { listRoots, listSubTasks } from '../list.js';
import { createMemoryStore } from '../../../store/project-registry.js';
import type { ProjectStore } from '../../../store/project-registry.js';
import type { Task } from '../../../types/task.js';

let store: ProjectStore;
let root: Task;

describe('task deletion', () => {
  beforeEach(() => {
    store = createMemoryStore();
    root = addRootTask({ name: 'Root' }, store);
    addSubTasks({
      rootId: root.id,
      subTasks: [
        { number: '1.1', name: 'a' },
        { number: '1.2', name: 'b' },
        { number: '2', name: 'c' },
      ],
    }, store);
  });

  afterEach(() => {
    store.close();
  });

  it('soft-deletes a subtree', () => {
    const group = store.tasks.getDescendantByNumber(root.id, '1');
    expect(deleteTask({ taskId: group?.id ?? 0 }, store)).toEqual({ deleted: 3 });
    expect(listSubTasks({ rootId: root.id }, store).map(t => t.number)).toEqual(['2']);
  });

  it('reports nothing deleted for an unknown id', () => {
    expect(deleteTask({ taskId: 999 }, store)).toEqual({ deleted: 0 });
  });

  it('deletes a whole tree through its root', () => {
    expect(deleteTask({ taskId: root.id }, store)).toEqual({ deleted: 5 });
    expect(listRoots(store)).toEqual([]);
  });

  it('soft-deletes everything', () => {
    addRootTask({ name: 'Other' }, store);
    expect(deleteAllTasks(store)).toEqual({ deleted: 6 });
    expect(listRoots(store)).toEqual([]);
  });

  it('purges and restarts ids', () => {
    clearAllTasks(store);
    expect(listRoots(store)).toEqual([]);
    expect(addRootTask({ name: 'Fresh' }, store).id).toBe(1);
  });
});
