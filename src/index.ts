/**
 * taskledger: a persisted, hierarchical task-tree ledger.
 *
 * Open a project with `ProjectRegistry`, then call the task operations
 * (or the repository on `store.tasks`) against the returned store.
 */

export * from './types/index.js';
export { LedgerError, isLedgerError } from './core/errors.js';
export { initLogger, getLogger, closeLogger, getLogDir } from './core/logger.js';
export { loadConfig, resolveConfig } from './core/config.js';
export { getLedgerDir, getConfigPath, getDbPath } from './core/paths.js';
export {
  TASK_STATUSES,
  TASK_STATUS_TRANSITIONS,
  canTransition,
  deriveParentStatus,
  isValidStatus,
} from './store/status-registry.js';
export { openDatabase, closeDatabase, SQLITE_SCHEMA_VERSION } from './store/sqlite.js';
export type { DatabaseHandle, LedgerDb, OpenDatabaseOptions } from './store/sqlite.js';
export { TaskRepository } from './store/task-store.js';
export type { TaskRepositoryOptions, UpdateTaskOptions } from './store/task-store.js';
export { MetaStore } from './store/meta-store.js';
export { ProjectRegistry, ProjectStore, createMemoryStore } from './store/project-registry.js';
export type { ProjectRegistryOptions } from './store/project-registry.js';
export * from './core/tasks/index.js';
