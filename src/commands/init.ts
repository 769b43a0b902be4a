import { getDatabaseConfig } from '../shared/config.js';
import { openDatabase } from '../storage/database.js';
import { initSchema } from '../storage/schema.js';

/**
 * Handles `pledger init`: resolves the pointer file, creates the database
 * file if needed, and creates both tables and their indexes.
 *
 * @returns The database path that was initialised
 * @throws ConfigError, SchemaExistsError
 */
export function runInit(cwd: string): string {
  const config = getDatabaseConfig(cwd);
  const database = openDatabase(config);
  try {
    initSchema(database.db);
  } finally {
    database.close();
  }
  return config.dbPath;
}
