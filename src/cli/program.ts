import { parseArgs } from 'node:util';

import { runCommit, type BranchOverride } from '../commands/commit.js';
import { planExtract, writeExtract } from '../commands/extract.js';
import { runInfo } from '../commands/info.js';
import { runInit } from '../commands/init.js';
import { runPrompt } from '../commands/prompt.js';
import { planUncommit, uncommit } from '../commands/uncommit.js';
import { debug } from '../shared/debug.js';
import { LedgerError } from '../shared/errors.js';
import { openLedger, type Ledger } from '../storage/ledger.js';

/**
 * Process boundary for the CLI. Injected so tests can drive commands
 * without a terminal.
 */
export interface CliIO {
  cwd: string;
  stdout(text: string): void;
  stderr(text: string): void;
  confirm(question: string): Promise<boolean>;
}

export const USAGE = `Usage: pledger <command> [options]

Commands:
  init                                   Create the sub-prompt and master-prompt tables
  commit -m <msg> [paths...]             Commit template files (all *.j2 in the directory if no paths)
         [--branch <parentId>:<path>]... Branch the file at <path> from sub-prompt <parentId>
         [--no-validate]                 Skip template syntax validation
  uncommit [--yes]                       Revert to the previous master prompt
  info [--key <id>]                      Show the current (or given) master prompt
  prompt [--key <id>]                    Print the assembled master prompt
  extract [--key <id>] [--yes]           Write the master prompt's sub-prompts as template files
`;

/** Raised for malformed command lines; printed with the usage text. */
class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function parseId(raw: string, what: string): number {
  if (!/^[1-9][0-9]*$/.test(raw)) {
    throw new UsageError(`${what} must be a positive integer, got '${raw}'`);
  }
  return Number(raw);
}

/**
 * Parses `<parentId>:<path>`.
 */
export function parseBranchSpec(spec: string): BranchOverride {
  const sep = spec.indexOf(':');
  if (sep <= 0 || sep === spec.length - 1) {
    throw new UsageError(`--branch expects <parentId>:<path>, got '${spec}'`);
  }
  return {
    parentId: parseId(spec.slice(0, sep), 'Branch parent id'),
    path: spec.slice(sep + 1),
  };
}

function withLedger<T>(cwd: string, fn: (ledger: Ledger) => T): T {
  const ledger = openLedger(cwd);
  try {
    return fn(ledger);
  } finally {
    ledger.database.close();
  }
}

async function withLedgerAsync<T>(cwd: string, fn: (ledger: Ledger) => Promise<T>): Promise<T> {
  const ledger = openLedger(cwd);
  try {
    return await fn(ledger);
  } finally {
    ledger.database.close();
  }
}

/**
 * Runs one CLI invocation and returns the process exit code.
 * Every error ends the command with `Error: <message>` on stderr and code 1.
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  try {
    const { values, positionals } = parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        message: { type: 'string', short: 'm' },
        branch: { type: 'string', multiple: true },
        'no-validate': { type: 'boolean' },
        key: { type: 'string' },
        yes: { type: 'boolean', short: 'y' },
        help: { type: 'boolean', short: 'h' },
      },
    });

    const [command, ...rest] = positionals;
    if (values.help || command === undefined) {
      io.stdout(USAGE);
      return command === undefined && !values.help ? 1 : 0;
    }

    const key = values.key === undefined ? undefined : parseId(values.key, '--key');
    debug('cli', 'Command', { command, args: rest.length });

    switch (command) {
      case 'init': {
        const dbPath = runInit(io.cwd);
        io.stdout(`Initialised ${dbPath}\n`);
        return 0;
      }

      case 'commit': {
        if (values.message === undefined) {
          throw new UsageError('commit requires a message (-m)');
        }
        const message = values.message;
        const outcome = withLedger(io.cwd, (ledger) =>
          runCommit(
            {
              cwd: io.cwd,
              message,
              paths: rest,
              branches: (values.branch ?? []).map(parseBranchSpec),
              validate: !values['no-validate'],
            },
            ledger,
          ),
        );
        if (outcome.status === 'unchanged') {
          io.stdout(`${outcome.reason}\n`);
          return 0;
        }
        io.stdout(
          `Committed master ${outcome.master.id} (version ${outcome.master.version}): ` +
            `${outcome.created.length} new, ${outcome.reused.length} unchanged sub-prompts\n`,
        );
        for (const sub of outcome.created) {
          io.stdout(`  + id=${sub.id} type=${sub.type} version=${sub.version}\n`);
        }
        if (outcome.branchedTypes.length > 0) {
          io.stdout(`  branched: ${outcome.branchedTypes.join(', ')}\n`);
        }
        return 0;
      }

      case 'uncommit': {
        return await withLedgerAsync(io.cwd, async (ledger) => {
          const plan = planUncommit(ledger);
          if (!values.yes) {
            io.stdout(
              `Uncommit will revert from master ${plan.current.id} to ${plan.previous.id}.\n` +
                'This is irreversible.\n',
            );
            if (!(await io.confirm('Proceed?'))) {
              io.stdout('Aborted.\n');
              return 0;
            }
          }
          const result = uncommit(ledger);
          io.stdout(
            `Reverted to master ${result.restored.id} (version ${result.restored.version})\n`,
          );
          return 0;
        });
      }

      case 'info': {
        const lines = withLedger(io.cwd, (ledger) => runInfo(ledger, key));
        io.stdout(lines.join('\n') + '\n');
        return 0;
      }

      case 'prompt': {
        io.stdout(withLedger(io.cwd, (ledger) => runPrompt(ledger, key)));
        return 0;
      }

      case 'extract': {
        return await withLedgerAsync(io.cwd, async (ledger) => {
          const plan = planExtract(ledger, io.cwd, key);
          if (plan.conflicts.length > 0 && !values.yes) {
            io.stdout(`The following files would be overwritten: ${plan.conflicts.join(', ')}\n`);
            if (!(await io.confirm('Proceed?'))) {
              io.stdout('Aborted.\n');
              return 0;
            }
          }
          const written = writeExtract(plan);
          io.stdout(`Wrote ${written.join(', ')}\n`);
          return 0;
        });
      }

      default:
        throw new UsageError(`Unknown command '${command}'`);
    }
  } catch (err) {
    if (err instanceof UsageError) {
      io.stderr(`Error: ${err.message}\n\n${USAGE}`);
      return 1;
    }
    if (err instanceof LedgerError) {
      io.stderr(`Error: ${err.message}\n`);
      return 1;
    }
    const message = err instanceof Error ? err.message : String(err);
    debug('cli', 'Unexpected error', { error: message });
    io.stderr(`Error: ${message}\n`);
    return 1;
  }
}
