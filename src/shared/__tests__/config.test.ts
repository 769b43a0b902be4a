import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { DEFAULT_BUSY_TIMEOUT, POINTER_FILENAME, getDatabaseConfig, resolveDbPath } from '../config.js';
import { ConfigError } from '../errors.js';

describe('resolveDbPath', () => {
  let cwd: string;

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), 'pledger-config-'));
  });

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
  });

  it('resolves a relative path against the working directory', () => {
    writeFileSync(join(cwd, POINTER_FILENAME), '  db/ledger.db  \nignored second line\n');
    expect(resolveDbPath(cwd)).toBe(join(cwd, 'db', 'ledger.db'));
    expect(existsSync(join(cwd, 'db'))).toBe(true);
  });

  it('keeps an absolute path and handles CRLF', () => {
    const target = join(cwd, 'elsewhere', 'ledger.db');
    writeFileSync(join(cwd, POINTER_FILENAME), `${target}\r\n`);
    expect(resolveDbPath(cwd)).toBe(target);
  });

  it('fails when the pointer file is missing', () => {
    expect(() => resolveDbPath(cwd)).toThrow(ConfigError);
    expect(() => resolveDbPath(cwd)).toThrow(`.pledger file not found in ${cwd}`);
  });

  it('fails when the first line is blank', () => {
    writeFileSync(join(cwd, POINTER_FILENAME), '   \nledger.db\n');
    expect(() => resolveDbPath(cwd)).toThrow('.pledger file is empty');
  });

  it('fails when the path is a directory', () => {
    mkdirSync(join(cwd, 'ledger.db'));
    writeFileSync(join(cwd, POINTER_FILENAME), 'ledger.db');
    expect(() => resolveDbPath(cwd)).toThrow(
      `Database path exists but is not a file: ${join(cwd, 'ledger.db')}`,
    );
  });
});

describe('getDatabaseConfig', () => {
  it('pairs the resolved path with the default busy timeout', () => {
    const cwd = mkdtempSync(join(tmpdir(), 'pledger-config-'));
    try {
      writeFileSync(join(cwd, POINTER_FILENAME), 'ledger.db');
      expect(getDatabaseConfig(cwd)).toEqual({
        dbPath: join(cwd, 'ledger.db'),
        busyTimeout: DEFAULT_BUSY_TIMEOUT,
      });
    } finally {
      rmSync(cwd, { recursive: true, force: true });
    }
  });
});
