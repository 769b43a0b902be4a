/**
 * Error taxonomy for prompt-ledger.
 *
 * Every failure is terminal for the invoking command. Each subclass carries a
 * stable machine-readable `code` and structured `context` so callers (and
 * tests) can branch on the kind without parsing messages.
 */

export type ErrorCategory =
  | 'config'
  | 'schema'
  | 'type-invariant'
  | 'uniqueness'
  | 'chain'
  | 'version'
  | 'validation'
  | 'lookup';

/** Base class for all prompt-ledger errors. */
export class LedgerError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;
  public readonly context?: Record<string, unknown>;

  constructor(params: {
    message: string;
    code: string;
    category: ErrorCategory;
    cause?: unknown;
    context?: Record<string, unknown>;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'LedgerError';
    this.code = params.code;
    this.category = params.category;
    this.context = params.context;
  }
}

// =============================================================================
// Configuration
// =============================================================================

/** Missing, empty, or unusable pointer file / database path. */
export class ConfigError extends LedgerError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super({ message, code: 'CONFIG_ERROR', category: 'config', context, cause });
    this.name = 'ConfigError';
  }
}

export class PathNotFoundError extends LedgerError {
  constructor(path: string) {
    super({
      message: `Path does not exist: ${path}`,
      code: 'PATH_NOT_FOUND',
      category: 'config',
      context: { path },
    });
    this.name = 'PathNotFoundError';
  }
}

/** Working-directory template filenames break the `<NN>_<type>.j2` prefix rules. */
export class FilenameValidationError extends LedgerError {
  constructor(message: string, files: string[]) {
    super({
      message,
      code: 'FILENAME_VALIDATION',
      category: 'config',
      context: { files },
    });
    this.name = 'FilenameValidationError';
  }
}

// =============================================================================
// Schema
// =============================================================================

export class SchemaExistsError extends LedgerError {
  constructor(existing: string[]) {
    super({
      message: `Cannot initialise: table already exists (${existing.join(', ')})`,
      code: 'SCHEMA_EXISTS',
      category: 'schema',
      context: { existing },
    });
    this.name = 'SchemaExistsError';
  }
}

export class SchemaMissingError extends LedgerError {
  constructor(missing: string[]) {
    super({
      message: `Database is not initialised (missing ${missing.join(', ')}); run "pledger init" first`,
      code: 'SCHEMA_MISSING',
      category: 'schema',
      context: { missing },
    });
    this.name = 'SchemaMissingError';
  }
}

// =============================================================================
// Type invariants
// =============================================================================

export class DuplicateTypeInCommitError extends LedgerError {
  constructor(duplicates: Record<string, string[]>) {
    const desc = Object.entries(duplicates)
      .map(([type, paths]) => `${type} (${paths.join(', ')})`)
      .join('; ');
    super({
      message: `Multiple files with same sub-prompt type in commit: ${desc}`,
      code: 'DUPLICATE_TYPE_IN_COMMIT',
      category: 'type-invariant',
      context: { duplicates },
    });
    this.name = 'DuplicateTypeInCommitError';
  }
}

export class DuplicateTypeInCurrentError extends LedgerError {
  constructor(type: string, masterId: number) {
    super({
      message: `Current master ${masterId} has duplicate sub-prompt type '${type}'`,
      code: 'DUPLICATE_TYPE_IN_CURRENT',
      category: 'type-invariant',
      context: { type, masterId },
    });
    this.name = 'DuplicateTypeInCurrentError';
  }
}

export class PartialCommitAddsNewTypeError extends LedgerError {
  constructor(types: string[]) {
    super({
      message: `Partial commit cannot add new sub-prompt types (${types.join(', ')}); run a full commit instead`,
      code: 'PARTIAL_COMMIT_ADDS_NEW_TYPE',
      category: 'type-invariant',
      context: { types },
    });
    this.name = 'PartialCommitAddsNewTypeError';
  }
}

export class PartialCommitMissingCwdFileError extends LedgerError {
  constructor(types: string[]) {
    super({
      message: `Partial commit keeps sub-prompt types with no template file in the working directory: ${types.join(', ')}`,
      code: 'PARTIAL_COMMIT_MISSING_CWD_FILE',
      category: 'type-invariant',
      context: { types },
    });
    this.name = 'PartialCommitMissingCwdFileError';
  }
}

// =============================================================================
// Uniqueness
// =============================================================================

export class DuplicateContentsError extends LedgerError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super({ message, code: 'DUPLICATE_CONTENTS', category: 'uniqueness', context, cause });
    this.name = 'DuplicateContentsError';
  }
}

export class CurrentMasterConflictError extends LedgerError {
  constructor(cause?: unknown) {
    super({
      message: 'More than one master prompt would be current',
      code: 'CURRENT_MASTER_CONFLICT',
      category: 'uniqueness',
      cause,
    });
    this.name = 'CurrentMasterConflictError';
  }
}

// =============================================================================
// Chain
// =============================================================================

export class NoCurrentMasterError extends LedgerError {
  constructor() {
    super({
      message: 'No current master prompt',
      code: 'NO_CURRENT_MASTER',
      category: 'chain',
    });
    this.name = 'NoCurrentMasterError';
  }
}

export class NoPreviousMasterError extends LedgerError {
  constructor(masterId: number) {
    super({
      message: `Master prompt ${masterId} has no previous master to revert to`,
      code: 'NO_PREVIOUS_MASTER',
      category: 'chain',
      context: { masterId },
    });
    this.name = 'NoPreviousMasterError';
  }
}

export class DanglingReferenceError extends LedgerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({ message, code: 'DANGLING_REFERENCE', category: 'chain', context });
    this.name = 'DanglingReferenceError';
  }
}

// =============================================================================
// Version
// =============================================================================

export class MalformedVersionError extends LedgerError {
  constructor(version: string) {
    super({
      message: `Malformed version string: '${version}'`,
      code: 'MALFORMED_VERSION',
      category: 'version',
      context: { version },
    });
    this.name = 'MalformedVersionError';
  }
}

// =============================================================================
// Input validation
// =============================================================================

export class MissingCommitMessageError extends LedgerError {
  constructor() {
    super({
      message: 'Commit message is required (-m)',
      code: 'MISSING_COMMIT_MESSAGE',
      category: 'validation',
    });
    this.name = 'MissingCommitMessageError';
  }
}

export class TemplateValidationError extends LedgerError {
  constructor(path: string, detail: string, cause?: unknown) {
    super({
      message: `Invalid template syntax in ${path}: ${detail}`,
      code: 'TEMPLATE_VALIDATION',
      category: 'validation',
      context: { path },
      cause,
    });
    this.name = 'TemplateValidationError';
  }
}

export class BranchParentNotFoundError extends LedgerError {
  constructor(parentId: number) {
    super({
      message: `Parent sub-prompt ${parentId} not found`,
      code: 'BRANCH_PARENT_NOT_FOUND',
      category: 'validation',
      context: { parentId },
    });
    this.name = 'BranchParentNotFoundError';
  }
}

export class BranchParentTypeMismatchError extends LedgerError {
  constructor(parentId: number, parentType: string, expectedType: string) {
    super({
      message: `Parent ${parentId} has type ${parentType}, expected ${expectedType}`,
      code: 'BRANCH_PARENT_TYPE_MISMATCH',
      category: 'validation',
      context: { parentId, parentType, expectedType },
    });
    this.name = 'BranchParentTypeMismatchError';
  }
}

export class BranchPathNotCommittedError extends LedgerError {
  constructor(path: string) {
    super({
      message: `Branch target is not a template file in this commit: ${path}`,
      code: 'BRANCH_PATH_NOT_COMMITTED',
      category: 'validation',
      context: { path },
    });
    this.name = 'BranchPathNotCommittedError';
  }
}

// =============================================================================
// Lookup
// =============================================================================

export class MasterNotFoundError extends LedgerError {
  constructor(masterId: number) {
    super({
      message: `Master prompt ${masterId} not found`,
      code: 'MASTER_NOT_FOUND',
      category: 'lookup',
      context: { masterId },
    });
    this.name = 'MasterNotFoundError';
  }
}
