import { DanglingReferenceError, MasterNotFoundError, NoCurrentMasterError } from '../shared/errors.js';
import type { MasterPrompt, SubPrompt } from '../shared/types.js';
import type { Ledger } from '../storage/ledger.js';

/**
 * Returns the master with id `key`, or the current master when no key is given.
 *
 * @throws MasterNotFoundError for an unknown key, NoCurrentMasterError when nothing is committed
 */
export function resolveMaster(ledger: Ledger, key?: number): MasterPrompt {
  if (key !== undefined) {
    const master = ledger.masters.getById(key);
    if (!master) {
      throw new MasterNotFoundError(key);
    }
    return master;
  }

  const current = ledger.masters.getCurrent();
  if (!current) {
    throw new NoCurrentMasterError();
  }
  return current;
}

/**
 * Resolves a master's ordered id list to full sub-prompt rows.
 *
 * @throws DanglingReferenceError if any referenced sub-prompt is missing
 */
export function resolveMembers(ledger: Ledger, master: MasterPrompt): SubPrompt[] {
  const members = ledger.subPrompts.getByIds(master.subPromptIds);
  if (members.length !== master.subPromptIds.length) {
    const found = new Set(members.map((s) => s.id));
    const missing = master.subPromptIds.filter((id) => !found.has(id));
    throw new DanglingReferenceError(
      `Master prompt ${master.id} references missing sub-prompts: ${missing.join(', ')}`,
      { masterId: master.id, missing },
    );
  }
  return members;
}
