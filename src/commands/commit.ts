// ---------------------------------------------------------------------------
// pledger commit -- reconcile template files into a new master prompt
// ---------------------------------------------------------------------------
// A full commit takes every template file in the working directory; a partial
// commit takes an explicit list and keeps the other current types at the
// position of their working files. Either way the result is one new master
// (made current) plus any new sub-prompt revisions, written in one transaction.
// ---------------------------------------------------------------------------

import Database from 'better-sqlite3';
import { isAbsolute, resolve } from 'node:path';

import { debug, debugTimed } from '../shared/debug.js';
import {
  BranchParentNotFoundError,
  BranchParentTypeMismatchError,
  BranchPathNotCommittedError,
  CurrentMasterConflictError,
  DanglingReferenceError,
  DuplicateContentsError,
  DuplicateTypeInCommitError,
  DuplicateTypeInCurrentError,
  MissingCommitMessageError,
  PartialCommitAddsNewTypeError,
  PartialCommitMissingCwdFileError,
} from '../shared/errors.js';
import type { MasterPrompt, SubPrompt, WorkingFile } from '../shared/types.js';
import type { Ledger } from '../storage/ledger.js';
import { branchVersion, deriveMasterVersion, incrementVersion } from '../versioning/version.js';
import { readWorkingFiles, scanWorkingDirectory } from '../workspace/scanner.js';
import { createTemplateValidator, type TemplateValidator } from '../workspace/template-validator.js';

/**
 * Forces a branch version for the candidate read from `path`, parented on `parentId`.
 */
export interface BranchOverride {
  parentId: number;
  path: string;
}

/**
 * `full`: the candidates are the whole working directory; current types
 * without a candidate are dropped.
 * `partial`: the candidates are an explicit subset; `workingSet` is the
 * scanned working directory, used to position the types being kept.
 */
export type CommitMode =
  | { kind: 'full' }
  | { kind: 'partial'; workingSet: readonly WorkingFile[] };

export interface CommitRequest {
  message: string;
  candidates: readonly WorkingFile[];
  mode: CommitMode;
  branches?: readonly BranchOverride[];
  validator?: TemplateValidator | null;
}

export type CommitOutcome =
  | {
      status: 'committed';
      master: MasterPrompt;
      created: SubPrompt[];
      reused: SubPrompt[];
      branchedTypes: string[];
    }
  | { status: 'unchanged'; reason: string };

/** A master member before ids are known: either an existing row or a row to insert. */
type PlannedMember =
  | { kind: 'existing'; position: number; sub: SubPrompt }
  | {
      kind: 'new';
      position: number;
      type: string;
      parentId: number | null;
      version: string;
      contents: string;
    };

function memberType(m: PlannedMember): string {
  return m.kind === 'existing' ? m.sub.type : m.type;
}

function memberVersion(m: PlannedMember): string {
  return m.kind === 'existing' ? m.sub.version : m.version;
}

function sameIds(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((id, i) => id === b[i]);
}

function findDuplicateTypes(files: readonly WorkingFile[]): Record<string, string[]> {
  const seen = new Map<string, string[]>();
  for (const f of files) {
    const names = seen.get(f.type) ?? [];
    names.push(f.filename);
    seen.set(f.type, names);
  }
  const duplicates: Record<string, string[]> = {};
  for (const [type, names] of seen) {
    if (names.length > 1) {
      duplicates[type] = names;
    }
  }
  return duplicates;
}

/**
 * Maps a constraint violation raised by SQLite onto the ledger taxonomy.
 * Anything else passes through unchanged.
 */
function mapConstraintError(err: unknown): unknown {
  if (!(err instanceof Database.SqliteError) || !err.code.startsWith('SQLITE_CONSTRAINT')) {
    return err;
  }
  if (err.message.includes('.contents')) {
    return new DuplicateContentsError(`Contents collision: ${err.message}`, {}, err);
  }
  if (err.message.includes('master_prompts.is_current')) {
    return new CurrentMasterConflictError(err);
  }
  return err;
}

/**
 * Reconciles commit candidates against the current master and writes a new
 * master snapshot.
 *
 * Every check runs before the first write. Reads and writes share one
 * transaction, so a failure at any step leaves the database untouched.
 *
 * @returns `unchanged` when the resulting id list equals the current master's
 */
export function commitCandidates(request: CommitRequest, ledger: Ledger): CommitOutcome {
  const { subPrompts, masters } = ledger;
  const message = request.message.trim();
  if (message.length === 0) {
    throw new MissingCommitMessageError();
  }

  // Branch overrides, keyed by resolved candidate path
  const branchByPath = new Map<string, number>();
  for (const b of request.branches ?? []) {
    branchByPath.set(b.path, b.parentId);
  }
  const candidatePaths = new Set(request.candidates.map((c) => c.path));
  for (const path of branchByPath.keys()) {
    if (!candidatePaths.has(path)) {
      throw new BranchPathNotCommittedError(path);
    }
  }

  if (request.candidates.length === 0) {
    return { status: 'unchanged', reason: 'Nothing to commit. No template files.' };
  }

  // Template validation: fail fast before any read or write
  if (request.validator) {
    for (const candidate of request.candidates) {
      request.validator.validate(candidate);
    }
  }

  const duplicates = findDuplicateTypes(request.candidates);
  if (Object.keys(duplicates).length > 0) {
    throw new DuplicateTypeInCommitError(duplicates);
  }

  const run = ledger.database.db.transaction((): CommitOutcome => {
    // 1. Current snapshot
    const current = masters.getCurrent();
    const currentIds = current?.subPromptIds ?? [];
    const currentMembers = subPrompts.getByIds(currentIds);
    if (current && currentMembers.length !== currentIds.length) {
      const found = new Set(currentMembers.map((s) => s.id));
      throw new DanglingReferenceError(
        `Master prompt ${current.id} references missing sub-prompts`,
        { masterId: current.id, missing: currentIds.filter((id) => !found.has(id)) },
      );
    }

    const currentByType = new Map<string, SubPrompt>();
    if (current) {
      for (const sub of currentMembers) {
        if (currentByType.has(sub.type)) {
          throw new DuplicateTypeInCurrentError(sub.type, current.id);
        }
        currentByType.set(sub.type, sub);
      }
    }

    // 2. Type-set reconciliation
    const candidateTypes = new Set(request.candidates.map((c) => c.type));
    const retained: PlannedMember[] = [];

    if (request.mode.kind === 'partial') {
      // With no current master every candidate type is new
      const added = [...candidateTypes].filter((t) => !currentByType.has(t));
      if (added.length > 0) {
        throw new PartialCommitAddsNewTypeError(added);
      }

      const workingByType = new Map(request.mode.workingSet.map((f) => [f.type, f]));
      const missing: string[] = [];
      for (const sub of currentMembers) {
        if (candidateTypes.has(sub.type)) continue;
        const working = workingByType.get(sub.type);
        if (!working) {
          missing.push(sub.type);
          continue;
        }
        retained.push({ kind: 'existing', position: working.position, sub });
      }
      if (missing.length > 0) {
        throw new PartialCommitMissingCwdFileError(missing);
      }
    }

    // 3. Per-candidate resolution
    const planned: PlannedMember[] = [];
    const newContents = new Map<string, string>();
    for (const candidate of request.candidates) {
      const existing = subPrompts.getByContents(candidate.contents);
      if (existing) {
        if (existing.type !== candidate.type) {
          throw new DuplicateContentsError(
            `Contents of ${candidate.filename} already stored as sub-prompt ${existing.id} of type '${existing.type}'`,
            { path: candidate.path, existingId: existing.id, existingType: existing.type },
          );
        }
        if (branchByPath.has(candidate.path)) {
          debug('commit', 'Branch override ignored for unchanged contents', { id: existing.id });
        }
        planned.push({ kind: 'existing', position: candidate.position, sub: existing });
        continue;
      }

      const otherType = newContents.get(candidate.contents);
      if (otherType !== undefined) {
        throw new DuplicateContentsError(
          `Types '${otherType}' and '${candidate.type}' have identical contents`,
          { types: [otherType, candidate.type] },
        );
      }
      newContents.set(candidate.contents, candidate.type);

      const overrideParentId = branchByPath.get(candidate.path);
      let parentId: number | null;
      let version: string;
      if (overrideParentId !== undefined) {
        const parent = subPrompts.getById(overrideParentId);
        if (!parent) {
          throw new BranchParentNotFoundError(overrideParentId);
        }
        if (parent.type !== candidate.type) {
          throw new BranchParentTypeMismatchError(overrideParentId, parent.type, candidate.type);
        }
        parentId = parent.id;
        version = branchVersion(parent.version);
      } else {
        const parent = currentByType.get(candidate.type);
        parentId = parent?.id ?? null;
        version = incrementVersion(parent?.version ?? null);
      }

      planned.push({
        kind: 'new',
        position: candidate.position,
        type: candidate.type,
        parentId,
        version,
        contents: candidate.contents,
      });
    }

    // 4. Assemble in working-file order
    const members = [...planned, ...retained].sort(
      (a, b) => a.position - b.position || memberType(a).localeCompare(memberType(b)),
    );

    // 5. No-op short circuit (only possible when nothing new is inserted)
    const hasNew = members.some((m) => m.kind === 'new');
    if (!hasNew) {
      const ids = members.flatMap((m) => (m.kind === 'existing' ? [m.sub.id] : []));
      if (current && sameIds(ids, current.subPromptIds)) {
        return { status: 'unchanged', reason: 'Nothing to commit. No changes detected.' };
      }
      const twin = masters.getBySubPromptIds(ids);
      if (twin) {
        throw new DuplicateContentsError(
          `Master prompt ${twin.id} already holds this exact set of sub-prompts`,
          { masterId: twin.id },
        );
      }
    }

    const { version: masterVersion, branchedTypes } = deriveMasterVersion(
      current?.version ?? null,
      currentMembers,
      members.map((m) => ({ type: memberType(m), version: memberVersion(m) })),
    );

    // 6. Writes
    const created: SubPrompt[] = [];
    const reused: SubPrompt[] = [];
    const ids: number[] = [];
    for (const m of members) {
      if (m.kind === 'existing') {
        reused.push(m.sub);
        ids.push(m.sub.id);
        continue;
      }
      const sub = subPrompts.insert({
        type: m.type,
        parentId: m.parentId,
        version: m.version,
        contents: m.contents,
        commitMessage: message,
      });
      created.push(sub);
      ids.push(sub.id);
    }

    if (current) {
      masters.clearCurrent();
    }
    const master = masters.insertCurrent({
      parentId: current?.id ?? null,
      version: masterVersion,
      subPromptIds: ids,
      commitMessage: message,
    });

    return { status: 'committed', master, created, reused, branchedTypes };
  });

  let outcome: CommitOutcome;
  try {
    outcome = debugTimed('commit', 'Commit transaction', run);
  } catch (err) {
    throw mapConstraintError(err);
  }

  if (outcome.status === 'committed') {
    debug('commit', 'Master committed', {
      masterId: outcome.master.id,
      version: outcome.master.version,
      created: outcome.created.length,
      reused: outcome.reused.length,
      branchedTypes: outcome.branchedTypes,
    });
  } else {
    debug('commit', 'Nothing to commit');
  }
  return outcome;
}

/**
 * Arguments of the `commit` command as parsed from the command line.
 */
export interface CommitCommandArgs {
  cwd: string;
  message: string;
  paths: readonly string[];
  branches: readonly BranchOverride[];
  validate: boolean;
}

/**
 * Handles `pledger commit`.
 *
 * No paths and no branch overrides -> full commit of the working directory.
 * Otherwise a partial commit of the listed paths plus every branch target.
 */
export function runCommit(args: CommitCommandArgs, ledger: Ledger): CommitOutcome {
  const validator = args.validate ? createTemplateValidator() : null;
  const toAbsolute = (p: string): string => (isAbsolute(p) ? p : resolve(args.cwd, p));

  if (args.paths.length === 0 && args.branches.length === 0) {
    return commitCandidates(
      {
        message: args.message,
        candidates: scanWorkingDirectory(args.cwd),
        mode: { kind: 'full' },
        validator,
      },
      ledger,
    );
  }

  const branches = args.branches.map((b) => ({ parentId: b.parentId, path: toAbsolute(b.path) }));
  const explicit = [...new Set([...args.paths.map(toAbsolute), ...branches.map((b) => b.path)])];

  return commitCandidates(
    {
      message: args.message,
      candidates: readWorkingFiles(explicit, args.cwd),
      mode: { kind: 'partial', workingSet: scanWorkingDirectory(args.cwd) },
      branches,
      validator,
    },
    ledger,
  );
}
