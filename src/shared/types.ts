import { z } from 'zod';

// =============================================================================
// Database Layer Types (snake_case, matches SQL columns)
// =============================================================================

/**
 * SubPromptRow -- the raw `sub_prompts` row shape.
 */
export const SubPromptRowSchema = z.object({
  id: z.number().int().positive(),
  type: z.string(),
  parent_id: z.number().int().positive().nullable(),
  version: z.string(),
  contents: z.string(),
  commit_message: z.string(),
  created_at: z.string(),
});

export type SubPromptRow = z.infer<typeof SubPromptRowSchema>;

/**
 * MasterPromptRow -- the raw `master_prompts` row shape.
 * `contents` is the JSON-serialized ordered list of sub-prompt ids.
 */
export const MasterPromptRowSchema = z.object({
  id: z.number().int().positive(),
  parent_id: z.number().int().positive().nullable(),
  version: z.string(),
  contents: z.string(),
  is_current: z.union([z.literal(0), z.literal(1)]),
  commit_message: z.string(),
  created_at: z.string(),
});

export type MasterPromptRow = z.infer<typeof MasterPromptRowSchema>;

/**
 * Shape of a parsed `master_prompts.contents` value.
 */
export const MasterContentsSchema = z.array(z.number().int().positive());

// =============================================================================
// Application Layer Types (camelCase)
// =============================================================================

/**
 * One immutable revision of a template fragment.
 */
export interface SubPrompt {
  id: number;
  type: string;
  parentId: number | null;
  version: string;
  contents: string;
  commitMessage: string;
  createdAt: string;
}

/**
 * An ordered snapshot of sub-prompt ids -- "the prompt" at one point in history.
 */
export interface MasterPrompt {
  id: number;
  parentId: number | null;
  version: string;
  subPromptIds: number[];
  isCurrent: boolean;
  commitMessage: string;
  createdAt: string;
}

export interface SubPromptInsert {
  type: string;
  parentId: number | null;
  version: string;
  contents: string;
  commitMessage: string;
}

export interface MasterPromptInsert {
  parentId: number | null;
  version: string;
  subPromptIds: number[];
  commitMessage: string;
}

// =============================================================================
// Working Directory Types
// =============================================================================

/**
 * A `<prefix>_<type>.j2` template file read from disk.
 * `position` is the numeric value of the prefix and orders the master prompt.
 */
export interface WorkingFile {
  path: string;
  filename: string;
  prefix: string;
  position: number;
  type: string;
  contents: string;
}

// =============================================================================
// Configuration Types
// =============================================================================

export interface DatabaseConfig {
  dbPath: string;
  busyTimeout: number;
}

// =============================================================================
// Mapping Helpers
// =============================================================================

/**
 * Serializes an ordered id list for `master_prompts.contents`.
 */
export function serializeMasterContents(ids: readonly number[]): string {
  return JSON.stringify(ids);
}

/**
 * Parses `master_prompts.contents` back into an ordered id list.
 */
export function parseMasterContents(contents: string): number[] {
  return MasterContentsSchema.parse(JSON.parse(contents));
}

export function rowToSubPrompt(row: SubPromptRow): SubPrompt {
  return {
    id: row.id,
    type: row.type,
    parentId: row.parent_id,
    version: row.version,
    contents: row.contents,
    commitMessage: row.commit_message,
    createdAt: row.created_at,
  };
}

export function rowToMasterPrompt(row: MasterPromptRow): MasterPrompt {
  return {
    id: row.id,
    parentId: row.parent_id,
    version: row.version,
    subPromptIds: parseMasterContents(row.contents),
    isCurrent: row.is_current === 1,
    commitMessage: row.commit_message,
    createdAt: row.created_at,
  };
}
