// ---------------------------------------------------------------------------
// pledger uncommit -- restore the master preceding the current one
// ---------------------------------------------------------------------------

import { debug, notice } from '../shared/debug.js';
import {
  DanglingReferenceError,
  NoCurrentMasterError,
  NoPreviousMasterError,
} from '../shared/errors.js';
import type { MasterPrompt } from '../shared/types.js';
import type { Ledger } from '../storage/ledger.js';

export interface UncommitPlan {
  current: MasterPrompt;
  previous: MasterPrompt;
}

export interface UncommitResult {
  removed: MasterPrompt;
  restored: MasterPrompt;
  deletedSubPromptIds: number[];
}

/**
 * Locates the current master and its parent without writing anything.
 * Used by the CLI to describe the revert before asking for confirmation.
 *
 * @throws NoCurrentMasterError, NoPreviousMasterError, DanglingReferenceError
 */
export function planUncommit(ledger: Ledger): UncommitPlan {
  const current = ledger.masters.getCurrent();
  if (!current) {
    throw new NoCurrentMasterError();
  }
  if (current.parentId === null) {
    throw new NoPreviousMasterError(current.id);
  }
  const previous = ledger.masters.getById(current.parentId);
  if (!previous) {
    throw new DanglingReferenceError(
      `Master prompt ${current.id} has parent ${current.parentId}, which does not exist`,
      { masterId: current.id, parentId: current.parentId },
    );
  }
  return { current, previous };
}

/**
 * Reverts the most recent commit in one transaction:
 *   1. delete the current master
 *   2. make its parent current again
 *   3. delete the sub-prompts the reverted commit created
 *
 * A sub-prompt in the current master but not in its parent was created by
 * the reverted commit unless another master still references it (a reused
 * older revision), in which case it stays. Deleting a row that some other
 * sub-prompt names as parent would break the chain, so that aborts.
 */
export function uncommit(ledger: Ledger): UncommitResult {
  const { masters, subPrompts } = ledger;

  const run = ledger.database.db.transaction((): UncommitResult => {
    const { current, previous } = planUncommit(ledger);

    const previousIds = new Set(previous.subPromptIds);
    const toDelete = current.subPromptIds.filter(
      (id) => !previousIds.has(id) && masters.countReferencing(id, current.id) === 0,
    );

    const deleting = new Set(toDelete);
    for (const id of toDelete) {
      const orphaned = subPrompts.listChildIds(id).filter((child) => !deleting.has(child));
      if (orphaned.length > 0) {
        throw new DanglingReferenceError(
          `Sub-prompt ${id} is the parent of sub-prompts outside the reverted commit`,
          { subPromptId: id, children: orphaned },
        );
      }
    }

    masters.deleteById(current.id);
    masters.setCurrent(previous.id);
    for (const id of toDelete) {
      subPrompts.deleteById(id);
    }

    const restored = masters.getById(previous.id);
    if (!restored) {
      throw new Error(`Failed to reload restored master prompt ${previous.id}`);
    }
    return { removed: current, restored, deletedSubPromptIds: toDelete };
  });

  const result = run();

  debug('uncommit', 'Reverted master', {
    removed: result.removed.id,
    restored: result.restored.id,
    deleted: result.deletedSubPromptIds,
  });
  if (result.deletedSubPromptIds.length > 0) {
    notice('uncommit', `Deleted sub-prompts ${result.deletedSubPromptIds.join(', ')}`);
  }
  return result;
}
