import { existsSync, mkdirSync, readFileSync, statSync } from 'node:fs';
import { dirname, isAbsolute, join, resolve } from 'node:path';

import { ConfigError } from './errors.js';
import type { DatabaseConfig } from './types.js';

/**
 * Name of the pointer file, looked up in the working directory.
 * Its first line holds the path of the SQLite database.
 */
export const POINTER_FILENAME = '.pledger';

/**
 * Default busy timeout in milliseconds.
 * A second writer waits this long for the lock before SQLITE_BUSY surfaces.
 */
export const DEFAULT_BUSY_TIMEOUT = 5000;

/**
 * Cached debug-enabled flag.
 * Resolved once per process -- debug mode does not change at runtime.
 */
let _debugCached: boolean | null = null;

/**
 * Returns whether debug logging is enabled for this process.
 * `PLEDGER_DEBUG` set to `"1"` or `"true"` enables it; anything else leaves it off.
 */
export function isDebugEnabled(): boolean {
  if (_debugCached !== null) {
    return _debugCached;
  }

  const envVal = process.env.PLEDGER_DEBUG;
  _debugCached = envVal === '1' || envVal === 'true';
  return _debugCached;
}

/**
 * Reads the database path from the pointer file in `cwd`.
 *
 * Relative paths resolve against `cwd`. The database's parent directory is
 * created when absent; the database file itself is created later by
 * better-sqlite3 on first open.
 *
 * @throws ConfigError when the pointer is missing or empty, or the path is unusable
 */
export function resolveDbPath(cwd: string): string {
  const pointer = join(cwd, POINTER_FILENAME);
  if (!existsSync(pointer)) {
    throw new ConfigError(`${POINTER_FILENAME} file not found in ${cwd}`, { pointer });
  }

  const [firstLine] = readFileSync(pointer, 'utf-8').split(/\r?\n/);
  const raw = firstLine.trim();
  if (raw.length === 0) {
    throw new ConfigError(`${POINTER_FILENAME} file is empty`, { pointer });
  }

  const dbPath = isAbsolute(raw) ? raw : resolve(cwd, raw);

  if (existsSync(dbPath) && !statSync(dbPath).isFile()) {
    throw new ConfigError(`Database path exists but is not a file: ${dbPath}`, { dbPath });
  }

  const parent = dirname(dbPath);
  try {
    mkdirSync(parent, { recursive: true });
  } catch (err) {
    throw new ConfigError(`Cannot create database directory ${parent}`, { parent }, err);
  }

  return dbPath;
}

/**
 * Returns the database configuration for the project rooted at `cwd`.
 */
export function getDatabaseConfig(cwd: string): DatabaseConfig {
  return {
    dbPath: resolveDbPath(cwd),
    busyTimeout: DEFAULT_BUSY_TIMEOUT,
  };
}
