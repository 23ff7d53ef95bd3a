/**
 * Tests for configuration resolution: defaults, project file and environment.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadConfig, parseEnvValue, resolveConfig } from '../config.js';
import { LedgerError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';

const ENV_KEYS = [
  'TASKLEDGER_DIR',
  'TASKLEDGER_LOG_LEVEL',
  'TASKLEDGER_LOG_FILE',
  'TASKLEDGER_DB_FILE',
  'TASKLEDGER_BUSY_TIMEOUT_MS',
  'TASKLEDGER_WAL',
];

let tempDir: string;

async function writeProjectConfig(content: string): Promise<void> {
  await mkdir(join(tempDir, '.taskledger'), { recursive: true });
  await writeFile(join(tempDir, '.taskledger', 'config.json'), content);
}

async function loadError(): Promise<LedgerError | null> {
  try {
    await loadConfig(tempDir);
    return null;
  } catch (err) {
    if (err instanceof LedgerError) return err;
    throw err;
  }
}

describe('config', () => {
  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'taskledger-config-'));
    for (const key of ENV_KEYS) delete process.env[key];
  });

  afterEach(async () => {
    for (const key of ENV_KEYS) delete process.env[key];
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('resolveConfig', () => {
    it('fills every default', () => {
      expect(resolveConfig()).toEqual({
        logging: {
          level: 'info',
          filePath: 'logs/taskledger.log',
          maxFileSize: 10 * 1024 * 1024,
          maxFiles: 5,
        },
        storage: {
          fileName: 'taskledger.sqlite',
          busyTimeoutMs: 5000,
          wal: true,
        },
      });
    });

    it('keeps partial sections', () => {
      const config = resolveConfig({ logging: { level: 'debug' } });
      expect(config.logging.level).toBe('debug');
      expect(config.logging.maxFiles).toBe(5);
    });

    it('rejects invalid values with CONFIG_ERROR', () => {
      let caught: unknown;
      try {
        resolveConfig({ logging: { level: 'loud' } });
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(LedgerError);
      expect(caught instanceof LedgerError && caught.code).toBe(ExitCode.CONFIG_ERROR);
      expect(caught instanceof LedgerError && caught.message).toMatch(/^Invalid configuration: logging\.level: /);
    });
  });

  describe('loadConfig', () => {
    it('uses defaults without a config file', async () => {
      expect(await loadConfig(tempDir)).toEqual(resolveConfig());
    });

    it('merges the project config file over defaults', async () => {
      await writeProjectConfig(JSON.stringify({ storage: { busyTimeoutMs: 100 } }));
      const config = await loadConfig(tempDir);
      expect(config.storage.busyTimeoutMs).toBe(100);
      expect(config.storage.fileName).toBe('taskledger.sqlite');
    });

    it('lets environment variables win', async () => {
      await writeProjectConfig(JSON.stringify({ logging: { level: 'warn' }, storage: { wal: true } }));
      process.env['TASKLEDGER_LOG_LEVEL'] = 'debug';
      process.env['TASKLEDGER_BUSY_TIMEOUT_MS'] = '250';
      process.env['TASKLEDGER_WAL'] = 'false';
      process.env['TASKLEDGER_DB_FILE'] = 'other.sqlite';

      const config = await loadConfig(tempDir);
      expect(config.logging.level).toBe('debug');
      expect(config.storage.busyTimeoutMs).toBe(250);
      expect(config.storage.wal).toBe(false);
      expect(config.storage.fileName).toBe('other.sqlite');
    });

    it('reads the config from TASKLEDGER_DIR', async () => {
      const ledgerDir = join(tempDir, 'elsewhere');
      await mkdir(ledgerDir);
      await writeFile(join(ledgerDir, 'config.json'), JSON.stringify({ logging: { maxFiles: 2 } }));
      process.env['TASKLEDGER_DIR'] = ledgerDir;

      expect((await loadConfig(tempDir)).logging.maxFiles).toBe(2);
    });

    it('rejects malformed JSON', async () => {
      await writeProjectConfig('{ not json');
      expect((await loadError())?.code).toBe(ExitCode.CONFIG_ERROR);
    });

    it('rejects a non-object document', async () => {
      await writeProjectConfig('[1, 2]');
      expect((await loadError())?.code).toBe(ExitCode.CONFIG_ERROR);
    });
  });

  describe('parseEnvValue', () => {
    it('parses booleans and numbers', () => {
      expect(parseEnvValue('true')).toBe(true);
      expect(parseEnvValue('false')).toBe(false);
      expect(parseEnvValue('42')).toBe(42);
      expect(parseEnvValue('info')).toBe('info');
      expect(parseEnvValue(' ')).toBe(' ');
    });
  });
});
