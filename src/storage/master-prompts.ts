import type BetterSqlite3 from 'better-sqlite3';

import { debug } from '../shared/debug.js';
import {
  MasterPromptRowSchema,
  rowToMasterPrompt,
  serializeMasterContents,
  type MasterPrompt,
  type MasterPromptInsert,
} from '../shared/types.js';

/**
 * Repository for `master_prompts` rows.
 *
 * The `parent_id` chain is the only notion of "previous": lookups are always
 * one hop (current -> parent), never ordered by timestamp.
 */
export class MasterPromptRepository {
  private readonly stmtInsert: BetterSqlite3.Statement;
  private readonly stmtGetById: BetterSqlite3.Statement;
  private readonly stmtGetCurrent: BetterSqlite3.Statement;
  private readonly stmtGetByContents: BetterSqlite3.Statement;
  private readonly stmtClearCurrent: BetterSqlite3.Statement;
  private readonly stmtSetCurrent: BetterSqlite3.Statement;
  private readonly stmtDelete: BetterSqlite3.Statement;
  private readonly stmtCountReferencing: BetterSqlite3.Statement;
  private readonly stmtListAll: BetterSqlite3.Statement;

  constructor(db: BetterSqlite3.Database) {
    this.stmtInsert = db.prepare(`
      INSERT INTO master_prompts (parent_id, version, contents, is_current, commit_message)
      VALUES (?, ?, ?, 1, ?)
    `);

    this.stmtGetById = db.prepare('SELECT * FROM master_prompts WHERE id = ?');

    this.stmtGetCurrent = db.prepare('SELECT * FROM master_prompts WHERE is_current = 1');

    this.stmtGetByContents = db.prepare('SELECT * FROM master_prompts WHERE contents = ?');

    this.stmtClearCurrent = db.prepare(
      'UPDATE master_prompts SET is_current = 0 WHERE is_current = 1',
    );

    this.stmtSetCurrent = db.prepare('UPDATE master_prompts SET is_current = 1 WHERE id = ?');

    this.stmtDelete = db.prepare('DELETE FROM master_prompts WHERE id = ?');

    // json_each walks the serialized id list of every master
    this.stmtCountReferencing = db.prepare(`
      SELECT COUNT(DISTINCT m.id)
      FROM master_prompts m, json_each(m.contents) j
      WHERE j.value = ? AND m.id != ?
    `).pluck();

    this.stmtListAll = db.prepare('SELECT * FROM master_prompts ORDER BY id');
  }

  /**
   * Inserts a master with `is_current = 1`. The caller clears the previous
   * current row first, inside the same transaction.
   */
  insertCurrent(input: MasterPromptInsert): MasterPrompt {
    const result = this.stmtInsert.run(
      input.parentId,
      input.version,
      serializeMasterContents(input.subPromptIds),
      input.commitMessage,
    );
    const id = Number(result.lastInsertRowid);

    const created = this.getById(id);
    if (!created) {
      throw new Error(`Failed to retrieve newly created master prompt ${id}`);
    }

    debug('db', 'Master prompt inserted', { id, version: input.version, parentId: input.parentId });
    return created;
  }

  getById(id: number): MasterPrompt | null {
    const row: unknown = this.stmtGetById.get(id);
    return row === undefined ? null : rowToMasterPrompt(MasterPromptRowSchema.parse(row));
  }

  getCurrent(): MasterPrompt | null {
    const row: unknown = this.stmtGetCurrent.get();
    return row === undefined ? null : rowToMasterPrompt(MasterPromptRowSchema.parse(row));
  }

  /**
   * Finds the master holding exactly this ordered id list, if any.
   */
  getBySubPromptIds(ids: readonly number[]): MasterPrompt | null {
    const row: unknown = this.stmtGetByContents.get(serializeMasterContents(ids));
    return row === undefined ? null : rowToMasterPrompt(MasterPromptRowSchema.parse(row));
  }

  clearCurrent(): void {
    this.stmtClearCurrent.run();
  }

  /**
   * Flags `id` as current. Does not clear other rows; the partial unique
   * index rejects a second current master.
   */
  setCurrent(id: number): void {
    const result = this.stmtSetCurrent.run(id);
    if (result.changes === 0) {
      throw new Error(`Master prompt not found: ${id}`);
    }
  }

  deleteById(id: number): void {
    this.stmtDelete.run(id);
    debug('db', 'Master prompt deleted', { id });
  }

  /**
   * Number of masters other than `excludeMasterId` whose contents include `subPromptId`.
   */
  countReferencing(subPromptId: number, excludeMasterId: number): number {
    const count: unknown = this.stmtCountReferencing.get(subPromptId, excludeMasterId);
    return typeof count === 'number' ? count : 0;
  }

  listAll(): MasterPrompt[] {
    const rows: unknown[] = this.stmtListAll.all();
    return rows.map((row) => rowToMasterPrompt(MasterPromptRowSchema.parse(row)));
  }
}
