import { isDebugEnabled } from './config.js';

/**
 * Subsystems that write log lines.
 *
 * - `db`: connection setup and row inserts/deletes
 * - `scan`: working-directory reads
 * - `commit` / `uncommit` / `extract`: command outcomes
 * - `cli`: dispatch and unexpected failures
 */
export type LogCategory = 'db' | 'scan' | 'commit' | 'uncommit' | 'extract' | 'cli';

let _enabled: boolean | null = null;

function enabled(): boolean {
  if (_enabled === null) {
    _enabled = isDebugEnabled();
  }
  return _enabled;
}

/**
 * One stderr line: `[2026-01-02T03:04:05.000Z] [PLEDGER:commit] Master committed {"masterId":3}`.
 * Data carries ids, counts and types; template contents never go in a log line.
 */
export function formatLogLine(
  category: LogCategory,
  message: string,
  data?: Record<string, unknown>,
  now: Date = new Date(),
): string {
  const line = `[${now.toISOString()}] [PLEDGER:${category}] ${message}`;
  return data === undefined ? line : `${line} ${JSON.stringify(data)}`;
}

/**
 * Writes a log line when `PLEDGER_DEBUG` is on; otherwise does nothing.
 */
export function debug(
  category: LogCategory,
  message: string,
  data?: Record<string, unknown>,
): void {
  if (enabled()) {
    process.stderr.write(formatLogLine(category, message, data) + '\n');
  }
}

/**
 * Runs `fn` and, in debug mode, logs how long it took.
 */
export function debugTimed<T>(category: LogCategory, message: string, fn: () => T): T {
  if (!enabled()) {
    return fn();
  }

  const start = performance.now();
  const result = fn();
  debug(category, `${message} (${(performance.now() - start).toFixed(2)}ms)`);
  return result;
}

/**
 * Always written, debug mode or not: `[pledger:uncommit] Deleted sub-prompts 4, 5`.
 */
export function notice(category: LogCategory, message: string): void {
  process.stderr.write(`[pledger:${category}] ${message}\n`);
}
