export { openDatabase } from './database.js';
export type { LedgerDatabase } from './database.js';
export { initSchema, assertSchema, tableExists, LEDGER_DDL, SCHEMA_TABLES } from './schema.js';
export { SubPromptRepository } from './sub-prompts.js';
export { MasterPromptRepository } from './master-prompts.js';
export { openLedger, createLedger } from './ledger.js';
export type { Ledger } from './ledger.js';

// Re-export types that consumers need
export type {
  SubPrompt,
  MasterPrompt,
  SubPromptInsert,
  MasterPromptInsert,
  WorkingFile,
  DatabaseConfig,
} from '../shared/types.js';
export { resolveDbPath, getDatabaseConfig, isDebugEnabled, POINTER_FILENAME } from '../shared/config.js';
export { debug, debugTimed } from '../shared/debug.js';
export type { LogCategory } from '../shared/debug.js';
