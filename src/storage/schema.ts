import type BetterSqlite3 from 'better-sqlite3';

import { debug } from '../shared/debug.js';
import { SchemaExistsError, SchemaMissingError } from '../shared/errors.js';

/**
 * Tables owned by prompt-ledger. `init` refuses to run if either exists.
 */
export const SCHEMA_TABLES = ['sub_prompts', 'master_prompts'] as const;

/**
 * DDL for both tables and their three indexes.
 *
 * - `idx_sub_prompts_contents`: one row per distinct template body, across all types.
 * - `idx_master_prompts_contents`: one master per distinct ordered id list.
 * - `idx_master_prompts_current`: partial unique index; at most one current master.
 */
export const LEDGER_DDL = `
  CREATE TABLE sub_prompts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    type TEXT NOT NULL,
    parent_id INTEGER REFERENCES sub_prompts(id),
    version TEXT NOT NULL,
    contents TEXT NOT NULL,
    commit_message TEXT NOT NULL,
    created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%SZ', 'now'))
  );

  CREATE UNIQUE INDEX idx_sub_prompts_contents ON sub_prompts(contents);

  CREATE TABLE master_prompts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    parent_id INTEGER REFERENCES master_prompts(id),
    version TEXT NOT NULL,
    contents TEXT NOT NULL,
    is_current INTEGER NOT NULL CHECK(is_current IN (0, 1)),
    commit_message TEXT NOT NULL,
    created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%SZ', 'now'))
  );

  CREATE UNIQUE INDEX idx_master_prompts_contents ON master_prompts(contents);

  CREATE UNIQUE INDEX idx_master_prompts_current
    ON master_prompts(is_current) WHERE is_current = 1;
`;

export function tableExists(db: BetterSqlite3.Database, table: string): boolean {
  const row = db
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?")
    .get(table);
  return row !== undefined;
}

/**
 * Creates both tables and all indexes in a single transaction.
 *
 * @throws SchemaExistsError if either table is already present
 */
export function initSchema(db: BetterSqlite3.Database): void {
  const existing = SCHEMA_TABLES.filter((t) => tableExists(db, t));
  if (existing.length > 0) {
    throw new SchemaExistsError(existing);
  }

  const create = db.transaction(() => {
    db.exec(LEDGER_DDL);
  });
  create();

  debug('db', 'Schema created', { tables: [...SCHEMA_TABLES] });
}

/**
 * Fails unless both tables exist. Every command except `init` calls this
 * before touching the repositories.
 *
 * @throws SchemaMissingError naming the absent tables
 */
export function assertSchema(db: BetterSqlite3.Database): void {
  const missing = SCHEMA_TABLES.filter((t) => !tableExists(db, t));
  if (missing.length > 0) {
    throw new SchemaMissingError(missing);
  }
}
