import type { Ledger } from '../storage/ledger.js';
import { resolveMaster, resolveMembers } from './query.js';

/**
 * Handles `pledger prompt`: the concatenated master prompt.
 * Each sub-prompt is preceded by a `[type]` line and followed by a blank line.
 */
export function runPrompt(ledger: Ledger, key?: number): string {
  const master = resolveMaster(ledger, key);
  return resolveMembers(ledger, master)
    .map((s) => `[${s.type}]\n${s.contents}\n\n`)
    .join('');
}
