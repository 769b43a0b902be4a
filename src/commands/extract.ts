// ---------------------------------------------------------------------------
// pledger extract -- write a master's sub-prompts back out as template files
// ---------------------------------------------------------------------------

import { existsSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { debug } from '../shared/debug.js';
import type { Ledger } from '../storage/ledger.js';
import { typeToFilename } from '../workspace/filenames.js';
import { resolveMaster, resolveMembers } from './query.js';

export interface ExtractTarget {
  filename: string;
  path: string;
  contents: string;
}

export interface ExtractPlan {
  masterId: number;
  targets: ExtractTarget[];
  /** Filenames that already exist and would be overwritten. */
  conflicts: string[];
}

/**
 * Computes the files `extract` would write, without touching the disk.
 * Filenames carry a zero-padded position: `01_intro.j2`, `02_body.j2`, ...
 */
export function planExtract(ledger: Ledger, cwd: string, key?: number): ExtractPlan {
  const master = resolveMaster(ledger, key);
  const members = resolveMembers(ledger, master);

  const targets = members.map((s, i) => {
    const filename = typeToFilename(s.type, i, members.length);
    return { filename, path: join(cwd, filename), contents: s.contents };
  });

  return {
    masterId: master.id,
    targets,
    conflicts: targets.filter((t) => existsSync(t.path)).map((t) => t.filename),
  };
}

/**
 * Writes every planned file. Overwrites existing files; the caller confirms first.
 */
export function writeExtract(plan: ExtractPlan): string[] {
  for (const target of plan.targets) {
    writeFileSync(target.path, target.contents, 'utf-8');
  }
  debug('extract', 'Files written', { masterId: plan.masterId, count: plan.targets.length });
  return plan.targets.map((t) => t.filename);
}
