import type { Ledger } from '../storage/ledger.js';
import { resolveMaster, resolveMembers } from './query.js';

/**
 * Handles `pledger info`: details of the current (or keyed) master as text lines.
 */
export function runInfo(ledger: Ledger, key?: number): string[] {
  const master = resolveMaster(ledger, key);
  const members = resolveMembers(ledger, master);

  return [
    `id: ${master.id}`,
    `version: ${master.version}`,
    `parent_id: ${master.parentId ?? '-'}`,
    `commit_message: ${master.commitMessage}`,
    `created_at: ${master.createdAt}`,
    `is_current: ${master.isCurrent ? 1 : 0}`,
    'sub_prompts:',
    ...members.map((s) => `  - id=${s.id} type=${s.type} version=${s.version}`),
  ];
}
