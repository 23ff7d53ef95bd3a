/**
 * Configuration engine for taskledger.
 *
 * Resolution priority: Environment vars > Project config > Defaults
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { LedgerConfig } from '../types/config.js';
import { ExitCode } from '../types/exit-codes.js';
import { LedgerError } from './errors.js';
import { getConfigPath, DEFAULT_DB_FILENAME } from './paths.js';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

const loggingSchema = z.object({
  level: z.enum(LOG_LEVELS).default('info'),
  filePath: z.string().min(1).default('logs/taskledger.log'),
  maxFileSize: z.number().int().positive().default(10 * 1024 * 1024), // 10MB
  maxFiles: z.number().int().positive().default(5),
});

const storageSchema = z.object({
  fileName: z.string().min(1).default(DEFAULT_DB_FILENAME),
  busyTimeoutMs: z.number().int().nonnegative().default(5000),
  wal: z.boolean().default(true),
});

const configSchema = z.object({
  logging: loggingSchema.default({}),
  storage: storageSchema.default({}),
});

/** Environment variable to config path mapping. */
const ENV_MAP: Record<string, string> = {
  'TASKLEDGER_LOG_LEVEL': 'logging.level',
  'TASKLEDGER_LOG_FILE': 'logging.filePath',
  'TASKLEDGER_DB_FILE': 'storage.fileName',
  'TASKLEDGER_BUSY_TIMEOUT_MS': 'storage.busyTimeoutMs',
  'TASKLEDGER_WAL': 'storage.wal',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Set a value at a dotted path in an object (mutates).
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  let current = obj;
  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  const last = parts[parts.length - 1];
  if (last !== undefined) current[last] = value;
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const [key, sourceVal] of Object.entries(source)) {
    const targetVal = result[key];
    result[key] = isRecord(sourceVal) && isRecord(targetVal)
      ? deepMerge(targetVal, sourceVal)
      : sourceVal;
  }
  return result;
}

/**
 * Parse an environment variable value to the appropriate type.
 */
export function parseEnvValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;
  return value;
}

/**
 * Read the project config file. Returns null if it does not exist.
 */
async function readProjectConfig(projectDir: string): Promise<Record<string, unknown> | null> {
  const configPath = getConfigPath(projectDir);
  let content: string;
  try {
    content = await readFile(configPath, 'utf8');
  } catch (err) {
    if (isRecord(err) && err['code'] === 'ENOENT') return null;
    throw new LedgerError(ExitCode.FILE_ERROR, `Cannot read config: ${configPath}`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new LedgerError(ExitCode.CONFIG_ERROR, `Invalid JSON in: ${configPath}`, { cause: err });
  }
  if (!isRecord(parsed)) {
    throw new LedgerError(ExitCode.CONFIG_ERROR, `Config must be a JSON object: ${configPath}`);
  }
  return parsed;
}

/**
 * Validate a raw (merged) config object and fill defaults.
 */
export function resolveConfig(raw: Record<string, unknown> = {}): LedgerConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new LedgerError(ExitCode.CONFIG_ERROR, `Invalid configuration: ${detail}`, {
      cause: result.error,
    });
  }
  const config: LedgerConfig = result.data;
  return config;
}

/**
 * Load and merge configuration from all sources.
 * Priority: defaults < project config < environment vars
 */
export async function loadConfig(projectDir: string): Promise<LedgerConfig> {
  let merged: Record<string, unknown> = {};

  const projectConfig = await readProjectConfig(projectDir);
  if (projectConfig) {
    merged = deepMerge(merged, projectConfig);
  }

  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (envValue !== undefined) {
      setNestedValue(merged, configPath, parseEnvValue(envValue));
    }
  }

  return resolveConfig(merged);
}
