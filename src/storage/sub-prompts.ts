import type BetterSqlite3 from 'better-sqlite3';

import { debug } from '../shared/debug.js';
import {
  SubPromptRowSchema,
  rowToSubPrompt,
  type SubPrompt,
  type SubPromptInsert,
} from '../shared/types.js';

/**
 * Repository for `sub_prompts` rows.
 *
 * Rows are immutable: there is no update. Inserts come only from the commit
 * orchestrator and deletes only from uncommit. All SQL statements are
 * prepared once in the constructor and reused.
 */
export class SubPromptRepository {
  private readonly db: BetterSqlite3.Database;

  private readonly stmtInsert: BetterSqlite3.Statement;
  private readonly stmtGetById: BetterSqlite3.Statement;
  private readonly stmtGetByContents: BetterSqlite3.Statement;
  private readonly stmtDelete: BetterSqlite3.Statement;
  private readonly stmtChildIds: BetterSqlite3.Statement;
  private readonly stmtListAll: BetterSqlite3.Statement;

  constructor(db: BetterSqlite3.Database) {
    this.db = db;

    this.stmtInsert = db.prepare(`
      INSERT INTO sub_prompts (type, parent_id, version, contents, commit_message)
      VALUES (?, ?, ?, ?, ?)
    `);

    this.stmtGetById = db.prepare('SELECT * FROM sub_prompts WHERE id = ?');

    this.stmtGetByContents = db.prepare('SELECT * FROM sub_prompts WHERE contents = ?');

    this.stmtDelete = db.prepare('DELETE FROM sub_prompts WHERE id = ?');

    this.stmtChildIds = db.prepare(
      'SELECT id FROM sub_prompts WHERE parent_id = ? ORDER BY id',
    ).pluck();

    this.stmtListAll = db.prepare('SELECT * FROM sub_prompts ORDER BY id');
  }

  /**
   * Inserts a new revision and returns it as stored (with id and created_at).
   */
  insert(input: SubPromptInsert): SubPrompt {
    const result = this.stmtInsert.run(
      input.type,
      input.parentId,
      input.version,
      input.contents,
      input.commitMessage,
    );
    const id = Number(result.lastInsertRowid);

    const created = this.getById(id);
    if (!created) {
      throw new Error(`Failed to retrieve newly created sub-prompt ${id}`);
    }

    debug('db', 'Sub-prompt inserted', { id, type: input.type, version: input.version });
    return created;
  }

  getById(id: number): SubPrompt | null {
    const row: unknown = this.stmtGetById.get(id);
    return row === undefined ? null : rowToSubPrompt(SubPromptRowSchema.parse(row));
  }

  /**
   * Looks up the single row holding exactly `contents` (contents are globally unique).
   */
  getByContents(contents: string): SubPrompt | null {
    const row: unknown = this.stmtGetByContents.get(contents);
    return row === undefined ? null : rowToSubPrompt(SubPromptRowSchema.parse(row));
  }

  /**
   * Fetches rows for `ids`, returned in the order of `ids`.
   * Ids with no row are skipped; callers that need every id compare lengths.
   */
  getByIds(ids: readonly number[]): SubPrompt[] {
    if (ids.length === 0) {
      return [];
    }

    const placeholders = ids.map(() => '?').join(', ');
    const rows: unknown[] = this.db
      .prepare(`SELECT * FROM sub_prompts WHERE id IN (${placeholders})`)
      .all(...ids);

    const byId = new Map<number, SubPrompt>();
    for (const row of rows) {
      const sub = rowToSubPrompt(SubPromptRowSchema.parse(row));
      byId.set(sub.id, sub);
    }

    const ordered: SubPrompt[] = [];
    for (const id of ids) {
      const sub = byId.get(id);
      if (sub) {
        ordered.push(sub);
      }
    }
    return ordered;
  }

  /**
   * Ids of the rows whose parent_id points at `id`.
   */
  listChildIds(id: number): number[] {
    const ids: unknown[] = this.stmtChildIds.all(id);
    return ids.filter((v): v is number => typeof v === 'number');
  }

  deleteById(id: number): void {
    this.stmtDelete.run(id);
    debug('db', 'Sub-prompt deleted', { id });
  }

  listAll(): SubPrompt[] {
    const rows: unknown[] = this.stmtListAll.all();
    return rows.map((row) => rowToSubPrompt(SubPromptRowSchema.parse(row)));
  }
}
