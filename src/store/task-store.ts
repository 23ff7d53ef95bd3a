/**
 * SQLite-backed task repository.
 *
 * CRUD and queries for one project's task forest, the status state machine
 * with upward propagation, progress aggregation and cascading soft delete.
 *
 * Transactions are the caller's business: wrap multi-call sequences in
 * `ProjectStore.transaction()` for all-or-nothing behaviour.
 */

import { and, asc, eq, inArray, ne, sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import * as schema from './schema.js';
import type { LedgerDb } from './sqlite.js';
import { applyPatch, fullPatch, patchToRow, rowToTask, taskToRow, toIso } from './converters.js';
import { canTransition, deriveParentStatus } from './status-registry.js';
import type { TaskStatus } from './status-registry.js';
import type { NewTask, Task, TaskPatch } from '../types/task.js';
import { LedgerError } from '../core/errors.js';
import type { Logger } from 'pino';
import { getLogger } from '../core/logger.js';
import { ExitCode } from '../types/exit-codes.js';

const { tasks } = schema;

/** Options for a field update. */
export interface UpdateTaskOptions {
  /** Fields to write; every writable field when omitted. Applied to the entity first. */
  set?: TaskPatch;
  /** Guard the write with the entity's version and bump it on success. */
  useVersion?: boolean;
}

export interface TaskRepositoryOptions {
  /** Clock for timestamps. */
  now?: () => Date;
}

/** Escape LIKE wildcards so a prefix matches literally. */
function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, '\\$&');
}

/** Arithmetic mean, clamped to [0, 1] against float drift. */
function meanProgress(children: readonly Task[]): number {
  const total = children.reduce((sum, child) => sum + child.progress, 0);
  return Math.min(1, Math.max(0, total / children.length));
}

export class TaskRepository {
  private readonly now: () => Date;

  constructor(
    private readonly db: LedgerDb,
    options: TaskRepositoryOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  private get log(): Logger {
    return getLogger('task-store');
  }

  // === QUERIES ===

  private selectLive(where: SQL | undefined): Task[] {
    return this.db
      .select()
      .from(tasks)
      .where(and(where, eq(tasks.deleted, false)))
      .orderBy(asc(tasks.number), asc(tasks.id))
      .all()
      .map(rowToTask);
  }

  /** Get a live task by id. */
  getById(taskId: number): Task | null {
    const row = this.db
      .select()
      .from(tasks)
      .where(and(eq(tasks.id, taskId), eq(tasks.deleted, false)))
      .get();
    return row ? rowToTask(row) : null;
  }

  /** Get a live task by its number within a root's tree. */
  getByRootIdAndNumber(rootId: number, number: string): Task | null {
    const row = this.db
      .select()
      .from(tasks)
      .where(and(eq(tasks.rootId, rootId), eq(tasks.number, number), eq(tasks.deleted, false)))
      .get();
    return row ? rowToTask(row) : null;
  }

  /**
   * Like getByRootIdAndNumber but never matches the root itself, whose own
   * number is free-form and may look like a descendant's.
   */
  getDescendantByNumber(rootId: number, number: string): Task | null {
    const row = this.db
      .select()
      .from(tasks)
      .where(and(
        eq(tasks.rootId, rootId),
        eq(tasks.number, number),
        ne(tasks.parentId, 0),
        eq(tasks.deleted, false),
      ))
      .get();
    return row ? rowToTask(row) : null;
  }

  /** Direct live children of a task, ordered by number (lexicographic). */
  listByParentId(parentId: number): Task[] {
    return this.selectLive(eq(tasks.parentId, parentId));
  }

  /** Every live task of a tree, root included. */
  listByRootId(rootId: number): Task[] {
    return this.selectLive(eq(tasks.rootId, rootId));
  }

  /** Live leaves of a tree. */
  listLeaves(rootId: number): Task[] {
    return this.selectLive(and(eq(tasks.rootId, rootId), eq(tasks.isLeaf, true)));
  }

  /** Live root tasks. */
  listRoots(): Task[] {
    return this.listByParentId(0);
  }

  /** Live roots whose name starts with `prefix`, ignoring case. */
  listRootsByName(prefix: string): Task[] {
    const pattern = `${escapeLike(prefix)}%`;
    return this.selectLive(
      and(eq(tasks.parentId, 0), sql`${tasks.name} LIKE ${pattern} ESCAPE '\\'`),
    );
  }

  private requireTask(taskId: number): Task {
    const task = this.getById(taskId);
    if (!task) {
      throw new LedgerError(ExitCode.NOT_FOUND, `Task not found: ${taskId}`);
    }
    return task;
  }

  // === WRITES ===

  /**
   * Store a new task and return it with its id.
   * A root gets `rootId = id` in a second write; a child demotes its parent to non-leaf.
   */
  insert(draft: NewTask): Task {
    const isRoot = draft.parentId === 0;
    let rootId = draft.rootId;

    if (!isRoot) {
      const parent = this.getById(draft.parentId);
      if (!parent) {
        throw new LedgerError(ExitCode.PARENT_NOT_FOUND, `Parent task not found: ${draft.parentId}`);
      }
      if (rootId === 0) rootId = parent.rootId;
      if (this.getDescendantByNumber(rootId, draft.number)) {
        throw new LedgerError(
          ExitCode.NUMBER_COLLISION,
          `Task number ${draft.number} already exists under root ${rootId}`,
        );
      }
    }

    const inserted = this.db
      .insert(tasks)
      .values(taskToRow({ ...draft, rootId }))
      .returning({ id: tasks.id })
      .get();
    const task: Task = { ...draft, rootId, id: inserted.id };

    if (isRoot) {
      this.db.update(tasks).set({ rootId: task.id }).where(eq(tasks.id, task.id)).run();
      task.rootId = task.id;
    } else {
      this.setLeaf(task.parentId, false);
    }

    this.log.debug({ taskId: task.id, parentId: task.parentId, number: task.number }, 'Task inserted');
    return task;
  }

  /**
   * Write fields of `task` to storage, refreshing `updatedTime`.
   * The entity takes the patch only once the row has been written.
   *
   * With `useVersion` the write only matches the version the caller holds and
   * bumps it atomically; a stale version and a missing or deleted row all
   * surface as CONCURRENT_MODIFICATION. Without it a missing or deleted row
   * is NOT_FOUND.
   */
  update(task: Task, options: UpdateTaskOptions = {}): void {
    const patch = options.set ?? fullPatch(task);

    const updatedTime = this.now();
    const values = { ...patchToRow(patch), updatedTime: toIso(updatedTime) };

    const result = options.useVersion
      ? this.db
        .update(tasks)
        .set({ ...values, version: sql`${tasks.version} + 1` })
        .where(and(eq(tasks.id, task.id), eq(tasks.version, task.version), eq(tasks.deleted, false)))
        .run()
      : this.db
        .update(tasks)
        .set(values)
        .where(and(eq(tasks.id, task.id), eq(tasks.deleted, false)))
        .run();

    if (result.changes === 0) {
      if (options.useVersion) {
        throw new LedgerError(
          ExitCode.CONCURRENT_MODIFICATION,
          `Task update failed (id ${task.id} not found, deleted or version ${task.version} is stale)`,
          { fix: 'Re-read the task and retry' },
        );
      }
      throw new LedgerError(ExitCode.NOT_FOUND, `Task update failed (id ${task.id} not found or deleted)`);
    }

    if (options.set) applyPatch(task, options.set);
    task.updatedTime = updatedTime;
    if (options.useVersion) task.version += 1;
    this.log.debug({ taskId: task.id, fields: Object.keys(values), version: task.version }, 'Task updated');
  }

  /** Plain (unversioned) leaf flag write. */
  private setLeaf(taskId: number, isLeaf: boolean): void {
    const result = this.db
      .update(tasks)
      .set({ isLeaf, updatedTime: toIso(this.now()) })
      .where(eq(tasks.id, taskId))
      .run();
    if (result.changes === 0) {
      throw new LedgerError(ExitCode.NOT_FOUND, `Task update failed (id ${taskId} not found)`);
    }
  }

  // === STATUS STATE MACHINE ===

  /** Validate and persist one status move, stamping started/finished time. */
  private transition(taskId: number, newStatus: TaskStatus): Task {
    const task = this.requireTask(taskId);
    if (!canTransition(task.status, newStatus)) {
      throw new LedgerError(
        ExitCode.STATUS_TRANSITION_INVALID,
        `Cannot transition task ${taskId} from ${task.status} to ${newStatus}`,
      );
    }

    const now = this.now();
    const startedTime = newStatus === 'started' ? now : task.startedTime;
    const finishedTime = newStatus === 'finished' ? now : task.finishedTime;
    this.update(task, {
      set: { status: newStatus, startedTime, finishedTime },
      useVersion: true,
    });
    this.log.debug({ taskId, status: newStatus }, 'Task status changed');
    return task;
  }

  /**
   * Walk from `parentId` towards the root, giving each group task the status
   * its children imply. Stops at the first level that needs no change, or
   * whose derived status the transition table does not allow.
   */
  private propagateStatus(parentId: number): void {
    let currentId = parentId;
    while (currentId !== 0) {
      const parent = this.getById(currentId);
      if (!parent) return;

      const derived = deriveParentStatus(this.listByParentId(currentId));
      if (derived === null || derived === parent.status) return;
      if (!canTransition(parent.status, derived)) {
        this.log.debug(
          { taskId: parent.id, from: parent.status, to: derived },
          'Derived parent status not reachable, propagation stopped',
        );
        return;
      }

      this.transition(parent.id, derived);
      currentId = parent.parentId;
    }
  }

  /** Move a task to `newStatus` and propagate the effect up the tree. */
  updateStatus(taskId: number, newStatus: TaskStatus): Task {
    const task = this.transition(taskId, newStatus);
    this.propagateStatus(task.parentId);
    return task;
  }

  /** Start a leaf in `created` status. */
  startById(taskId: number): Task {
    const task = this.requireTask(taskId);
    if (task.status !== 'created') {
      throw new LedgerError(ExitCode.PRECONDITION_FAILED, `Task ${taskId} is not in 'created' status`);
    }
    if (!task.isLeaf) {
      throw new LedgerError(ExitCode.PRECONDITION_FAILED, `Task ${taskId} is not a leaf`);
    }
    this.updateStatus(taskId, 'started');
    return this.requireTask(taskId);
  }

  /** Finish a leaf in `started` status. */
  finishById(taskId: number): Task {
    const task = this.requireTask(taskId);
    if (task.status !== 'started') {
      throw new LedgerError(ExitCode.PRECONDITION_FAILED, `Task ${taskId} is not in 'started' status`);
    }
    if (!task.isLeaf) {
      throw new LedgerError(ExitCode.PRECONDITION_FAILED, `Task ${taskId} is not a leaf`);
    }
    this.updateStatus(taskId, 'finished');
    return this.requireTask(taskId);
  }

  /**
   * Resume the first started leaf of a tree, or start the first created one.
   * Returns null when every leaf is finished.
   */
  startOrResume(rootId: number): Task | null {
    const leaves = this.listLeaves(rootId);
    const resumed = leaves.find(leaf => leaf.status === 'started');
    if (resumed) return resumed;

    const next = leaves.find(leaf => leaf.status === 'created');
    if (!next) return null;
    return this.updateStatus(next.id, 'started');
  }

  /** Alias of startOrResume for worker-style callers. */
  dequeue(rootId: number): Task | null {
    return this.startOrResume(rootId);
  }

  // === PROGRESS ===

  /** Recompute each ancestor's progress as the mean of its live children. */
  private aggregateProgress(parentId: number): void {
    let currentId = parentId;
    while (currentId !== 0) {
      const children = this.listByParentId(currentId);
      if (children.length === 0) return;
      const parent = this.getById(currentId);
      if (!parent) return;

      this.update(parent, { set: { progress: meanProgress(children) } });
      currentId = parent.parentId;
    }
  }

  /** Set a task's progress and re-average every ancestor. */
  updateProgress(taskId: number, progress: number): Task {
    if (!Number.isFinite(progress) || progress < 0 || progress > 1) {
      throw new LedgerError(ExitCode.PRECONDITION_FAILED, 'Progress must be between 0.0 and 1.0');
    }
    const task = this.requireTask(taskId);
    this.update(task, { set: { progress } });
    this.log.debug({ taskId, progress }, 'Task progress changed');

    this.aggregateProgress(task.parentId);
    return task;
  }

  // === DELETION ===

  /**
   * Soft-delete a task and its whole subtree, level by level.
   * Afterwards the parent becomes a leaf again if no live children remain;
   * otherwise its status and progress are re-derived.
   * Returns the number of rows marked.
   */
  deleteById(taskId: number): number {
    const target = this.getById(taskId);
    if (!target) return 0;

    let marked = 0;
    let level = [taskId];
    while (level.length > 0) {
      const result = this.db
        .update(tasks)
        .set({ deleted: true })
        .where(and(inArray(tasks.id, level), eq(tasks.deleted, false)))
        .run();
      marked += result.changes;

      level = this.db
        .select({ id: tasks.id })
        .from(tasks)
        .where(and(inArray(tasks.parentId, level), eq(tasks.deleted, false)))
        .all()
        .map(row => row.id);
    }

    if (target.parentId !== 0) {
      if (this.listByParentId(target.parentId).length === 0) {
        this.setLeaf(target.parentId, true);
      } else {
        this.propagateStatus(target.parentId);
        this.aggregateProgress(target.parentId);
      }
    }

    this.log.info({ taskId, marked }, 'Task subtree soft-deleted');
    return marked;
  }

  /** Mark every task deleted. Returns the number of rows marked. */
  deleteAll(): number {
    const result = this.db
      .update(tasks)
      .set({ deleted: true })
      .where(eq(tasks.deleted, false))
      .run();
    this.log.info({ marked: result.changes }, 'All tasks soft-deleted');
    return result.changes;
  }

  /** Physically purge every task and reset id generation. Irreversible. */
  clear(): void {
    this.db.delete(tasks).run();
    const sequence = this.db.all<{ name: string }>(
      sql`SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'sqlite_sequence'`,
    );
    if (sequence.length > 0) {
      this.db.run(sql`DELETE FROM sqlite_sequence WHERE name = 'tasks'`);
    }
    this.log.info('Task table purged');
  }
}
