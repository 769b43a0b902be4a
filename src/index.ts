// prompt-ledger library entry point

export * from './storage/index.js';
export * from './shared/errors.js';

export {
  parseVersion,
  formatVersion,
  incrementVersion,
  branchVersion,
  isBranched,
  compareVersions,
  deriveMasterVersion,
} from './versioning/version.js';
export type { VersionedMember, MasterVersionResult } from './versioning/version.js';

export { commitCandidates, runCommit } from './commands/commit.js';
export type {
  BranchOverride,
  CommitMode,
  CommitRequest,
  CommitOutcome,
  CommitCommandArgs,
} from './commands/commit.js';
export { uncommit, planUncommit } from './commands/uncommit.js';
export type { UncommitPlan, UncommitResult } from './commands/uncommit.js';
export { resolveMaster, resolveMembers } from './commands/query.js';
export { runInfo } from './commands/info.js';
export { runPrompt } from './commands/prompt.js';
export { planExtract, writeExtract } from './commands/extract.js';
export type { ExtractPlan, ExtractTarget } from './commands/extract.js';
export { runInit } from './commands/init.js';

export { parseFilename, typeToFilename, validatePrefixes } from './workspace/filenames.js';
export { scanWorkingDirectory, readWorkingFiles } from './workspace/scanner.js';
export { createTemplateValidator } from './workspace/template-validator.js';
export type { TemplateValidator } from './workspace/template-validator.js';
