import { getDatabaseConfig } from '../shared/config.js';
import { openDatabase, type LedgerDatabase } from './database.js';
import { MasterPromptRepository } from './master-prompts.js';
import { assertSchema } from './schema.js';
import { SubPromptRepository } from './sub-prompts.js';

/**
 * Everything a command needs to read or write the ledger.
 */
export interface Ledger {
  database: LedgerDatabase;
  subPrompts: SubPromptRepository;
  masters: MasterPromptRepository;
}

/**
 * Builds repositories over an already-open database whose schema exists.
 *
 * @throws SchemaMissingError if `init` has not been run
 */
export function createLedger(database: LedgerDatabase): Ledger {
  assertSchema(database.db);
  return {
    database,
    subPrompts: new SubPromptRepository(database.db),
    masters: new MasterPromptRepository(database.db),
  };
}

/**
 * Resolves the pointer file in `cwd`, opens the database and wires repositories.
 * The caller closes `ledger.database` when done.
 */
export function openLedger(cwd: string): Ledger {
  const database = openDatabase(getDatabaseConfig(cwd));
  try {
    return createLedger(database);
  } catch (err) {
    database.close();
    throw err;
  }
}
