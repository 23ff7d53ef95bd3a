/**
 * Tests for ledger path resolution.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { join } from 'node:path';
import { getConfigPath, getDbPath, getLedgerDir, getLedgerDirName } from '../paths.js';

describe('paths', () => {
  afterEach(() => {
    delete process.env['TASKLEDGER_DIR'];
  });

  it('defaults to .taskledger inside the project', () => {
    expect(getLedgerDirName()).toBe('.taskledger');
    expect(getLedgerDir('/work/app')).toBe(join('/work/app', '.taskledger'));
    expect(getConfigPath('/work/app')).toBe(join('/work/app', '.taskledger', 'config.json'));
    expect(getDbPath('/work/app')).toBe(join('/work/app', '.taskledger', 'taskledger.sqlite'));
  });

  it('takes a custom database file name', () => {
    expect(getDbPath('/work/app', 'tasks.db')).toBe(join('/work/app', '.taskledger', 'tasks.db'));
  });

  it('resolves a relative TASKLEDGER_DIR against the project', () => {
    process.env['TASKLEDGER_DIR'] = 'state/ledger';
    expect(getLedgerDir('/work/app')).toBe(join('/work/app', 'state', 'ledger'));
  });

  it('uses an absolute TASKLEDGER_DIR as is', () => {
    process.env['TASKLEDGER_DIR'] = '/var/ledger';
    expect(getLedgerDir('/work/app')).toBe('/var/ledger');
  });
});
