/**
 * Key/value metadata kept beside the tasks table (schema_meta).
 */

import { eq } from 'drizzle-orm';
import { schemaMeta } from './schema.js';
import type { LedgerDb } from './sqlite.js';

export class MetaStore {
  constructor(private readonly db: LedgerDb) {}

  /** Get a value, or null when the key was never set. */
  get(key: string): string | null {
    const row = this.db.select().from(schemaMeta).where(eq(schemaMeta.key, key)).get();
    return row?.value ?? null;
  }

  /** Insert or overwrite a value. */
  set(key: string, value: string): void {
    this.db
      .insert(schemaMeta)
      .values({ key, value })
      .onConflictDoUpdate({ target: schemaMeta.key, set: { value } })
      .run();
  }

  /** Schema version recorded when the database was created. */
  getSchemaVersion(): string | null {
    return this.get('schemaVersion');
  }
}
