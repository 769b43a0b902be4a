import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import { debug } from '../shared/debug.js';
import type { DatabaseConfig } from '../shared/types.js';

/**
 * Wrapper around a configured better-sqlite3 database instance.
 */
export interface LedgerDatabase {
  db: Database.Database;
  close(): void;
}

/**
 * Opens the ledger database with WAL mode and per-connection PRAGMAs.
 *
 * One synchronous connection per invocation. Schema creation is NOT done
 * here -- `init` owns that, and every other command asserts the schema.
 *
 * @param config - Database path and busy timeout configuration
 */
export function openDatabase(config: DatabaseConfig): LedgerDatabase {
  mkdirSync(dirname(config.dbPath), { recursive: true });

  const db = new Database(config.dbPath);

  // WAL first -- synchronous = NORMAL is only safe with WAL
  const journalMode: unknown = db.pragma('journal_mode = WAL', { simple: true });
  if (journalMode !== 'wal') {
    process.stderr.write(
      `WARNING: WAL mode not active (got '${String(journalMode)}'). ` +
        'Database may be on a read-only filesystem.\n',
    );
  }

  // busy_timeout -- per-connection; serializes concurrent writer processes
  db.pragma(`busy_timeout = ${config.busyTimeout}`);
  db.pragma('synchronous = NORMAL');

  // foreign_keys -- per-connection, not persistent; enforces parent_id references
  db.pragma('foreign_keys = ON');

  debug('db', 'Database opened', { dbPath: config.dbPath });

  return {
    db,

    close(): void {
      try {
        db.pragma('wal_checkpoint(PASSIVE)');
      } catch (err) {
        debug('db', 'Checkpoint before close failed', { error: String(err) });
      }
      db.close();
    },
  };
}
