/**
 * Tests for task drafts and planned duration.
 */

import { describe, it, expect } from 'vitest';
import { createTaskDraft, getPlannedDuration, isRoot, setPlannedDuration } from '../draft.js';

const NOW = new Date('2026-04-10T12:00:00.000Z');

describe('createTaskDraft', () => {
  it('fills the defaults of a new task', () => {
    expect(createTaskDraft({ name: 'Ship' }, NOW)).toEqual({
      name: 'Ship',
      description: '',
      status: 'created',
      version: 1,
      number: '',
      isLeaf: true,
      rootId: 0,
      parentId: 0,
      createdTime: NOW,
      updatedTime: NOW,
      startedTime: null,
      finishedTime: null,
      plannedStartTime: null,
      plannedFinishTime: null,
      progress: 0,
      deleted: false,
    });
  });

  it('keeps seeded fields', () => {
    const draft = createTaskDraft({ name: 'Child', number: '1.1', parentId: 4, rootId: 2 }, NOW);
    expect(draft.number).toBe('1.1');
    expect(isRoot(draft)).toBe(false);
    expect(isRoot(createTaskDraft({ name: 'Top' }))).toBe(true);
  });
});

describe('planned duration', () => {
  it('is null unless both planned times exist', () => {
    expect(getPlannedDuration(createTaskDraft({ name: 'x', plannedStartTime: NOW }))).toBeNull();
  });

  it('is measured in seconds', () => {
    const draft = createTaskDraft({
      name: 'x',
      plannedStartTime: NOW,
      plannedFinishTime: new Date('2026-04-10T14:30:00.000Z'),
    });
    expect(getPlannedDuration(draft)).toBe(9000);
  });

  it('sets the finish from the start', () => {
    const draft = createTaskDraft({ name: 'x', plannedStartTime: NOW });
    setPlannedDuration(draft, 3600);
    expect(draft.plannedFinishTime?.toISOString()).toBe('2026-04-10T13:00:00.000Z');
  });

  it('ignores a zero duration or a missing start', () => {
    const started = createTaskDraft({ name: 'x', plannedStartTime: NOW });
    setPlannedDuration(started, 0);
    expect(started.plannedFinishTime).toBeNull();

    const unplanned = createTaskDraft({ name: 'y' });
    setPlannedDuration(unplanned, 60);
    expect(unplanned.plannedFinishTime).toBeNull();
  });
});
