/**
 * Project registry: one open ledger database per project directory.
 *
 * The registry is an explicit object owned by the caller; there is no
 * process-wide connection cache. Each project directory resolves to
 * `<project>/.taskledger/taskledger.sqlite` (see core/paths.ts).
 */

import { mkdir } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { closeDatabase, openDatabase } from './sqlite.js';
import type { DatabaseHandle } from './sqlite.js';
import { TaskRepository } from './task-store.js';
import type { TaskRepositoryOptions } from './task-store.js';
import { MetaStore } from './meta-store.js';
import { loadConfig, resolveConfig } from '../core/config.js';
import type { Logger } from 'pino';
import { getDbPath, getLedgerDir } from '../core/paths.js';
import { getLogger, initLogger, isLoggerInitialized } from '../core/logger.js';
import type { LedgerConfig } from '../types/config.js';

/** One project's open database with its repositories. */
export class ProjectStore {
  readonly tasks: TaskRepository;
  readonly meta: MetaStore;

  constructor(
    readonly projectDir: string,
    private readonly handle: DatabaseHandle,
    readonly config: LedgerConfig,
    options: TaskRepositoryOptions = {},
  ) {
    this.tasks = new TaskRepository(handle.db, options);
    this.meta = new MetaStore(handle.db);
  }

  get dbPath(): string {
    return this.handle.path;
  }

  get isOpen(): boolean {
    return this.handle.nativeDb.open;
  }

  /**
   * Run `fn` in one transaction: committed when it returns, rolled back when
   * it throws. Nested calls become savepoints.
   */
  transaction<T>(fn: () => T): T {
    return this.handle.nativeDb.transaction(fn)();
  }

  close(): void {
    closeDatabase(this.handle);
  }
}

/**
 * Open an ephemeral in-memory store, detached from any registry.
 */
export function createMemoryStore(options: TaskRepositoryOptions = {}): ProjectStore {
  const config = resolveConfig();
  const handle = openDatabase(':memory:', { busyTimeoutMs: config.storage.busyTimeoutMs });
  return new ProjectStore(':memory:', handle, config, options);
}

export interface ProjectRegistryOptions extends TaskRepositoryOptions {
  /**
   * Start the rotating file logger from the logging config of the first
   * project opened while no logger is active (default: true).
   */
  initLogging?: boolean;
}

/** Open stores keyed by absolute project directory. */
export class ProjectRegistry {
  private readonly stores = new Map<string, ProjectStore>();
  /** Guard against concurrent opens of the same project. */
  private readonly pending = new Map<string, Promise<ProjectStore>>();

  constructor(private readonly options: ProjectRegistryOptions = {}) {}

  private get log(): Logger {
    return getLogger('registry');
  }

  /**
   * Open (or return the already open) store of a project.
   * Creates the ledger directory and database on first use, and starts
   * file logging when no logger is active yet.
   */
  async open(projectDir: string): Promise<ProjectStore> {
    const key = resolve(projectDir);

    const existing = this.stores.get(key);
    if (existing) return existing;

    const inflight = this.pending.get(key);
    if (inflight) return inflight;

    const opening = (async () => {
      const config = await loadConfig(key);
      const dbPath = getDbPath(key, config.storage.fileName);
      await mkdir(dirname(dbPath), { recursive: true });

      if (this.options.initLogging !== false && !isLoggerInitialized()) {
        initLogger(getLedgerDir(key), config.logging);
      }

      const handle = openDatabase(dbPath, {
        busyTimeoutMs: config.storage.busyTimeoutMs,
        wal: config.storage.wal,
      });
      const store = new ProjectStore(key, handle, config, { now: this.options.now });
      this.stores.set(key, store);
      this.log.info({ projectDir: key, dbPath }, 'Project store opened');
      return store;
    })();

    this.pending.set(key, opening);
    try {
      return await opening;
    } finally {
      this.pending.delete(key);
    }
  }

  /** The open store of a project, or null. */
  get(projectDir: string): ProjectStore | null {
    return this.stores.get(resolve(projectDir)) ?? null;
  }

  /** Close one project's store. Returns false when it was not open. */
  close(projectDir: string): boolean {
    const key = resolve(projectDir);
    const store = this.stores.get(key);
    if (!store) return false;
    this.stores.delete(key);
    store.close();
    this.log.info({ projectDir: key }, 'Project store closed');
    return true;
  }

  /** Close every open store. */
  closeAll(): void {
    const open = [...this.stores.values()];
    this.stores.clear();
    for (const store of open) {
      store.close();
    }
  }

  /** Number of open stores. */
  get size(): number {
    return this.stores.size;
  }
}
