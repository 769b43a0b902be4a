import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { basename, isAbsolute, join, resolve } from 'node:path';

import { debug } from '../shared/debug.js';
import { PathNotFoundError } from '../shared/errors.js';
import type { WorkingFile } from '../shared/types.js';
import { parseFilename, prefixPosition, validatePrefixes } from './filenames.js';

function byFilename(a: WorkingFile, b: WorkingFile): number {
  if (a.filename < b.filename) return -1;
  if (a.filename > b.filename) return 1;
  return 0;
}

/**
 * Reads one template file, or returns null when the name is not a template.
 */
function readWorkingFile(path: string): WorkingFile | null {
  const filename = basename(path);
  const parsed = parseFilename(filename);
  if (!parsed) {
    return null;
  }
  return {
    path,
    filename,
    prefix: parsed.prefix,
    position: prefixPosition(parsed.prefix, filename),
    type: parsed.type,
    contents: readFileSync(path, 'utf-8'),
  };
}

/**
 * Scans `cwd` (non-recursively) for template files, sorted by filename.
 * The whole set must pass prefix validation.
 */
export function scanWorkingDirectory(cwd: string): WorkingFile[] {
  const entries = readdirSync(cwd, { withFileTypes: true });

  const prefixes = entries
    .filter((e) => e.isFile())
    .map((e) => ({ filename: e.name, parsed: parseFilename(e.name) }));
  validatePrefixes(
    prefixes.flatMap((p) => (p.parsed ? [{ filename: p.filename, prefix: p.parsed.prefix }] : [])),
  );

  const files: WorkingFile[] = [];
  for (const p of prefixes) {
    if (!p.parsed) continue;
    const file = readWorkingFile(join(cwd, p.filename));
    if (file) files.push(file);
  }
  files.sort(byFilename);

  debug('scan', 'Working directory scanned', { cwd, count: files.length });
  return files;
}

/**
 * Reads an explicit list of paths (relative to `cwd` or absolute).
 * Every path must exist; paths that are not template files are skipped.
 */
export function readWorkingFiles(paths: readonly string[], cwd: string): WorkingFile[] {
  const files: WorkingFile[] = [];
  for (const p of paths) {
    const abs = isAbsolute(p) ? p : resolve(cwd, p);
    if (!existsSync(abs)) {
      throw new PathNotFoundError(p);
    }
    const file = readWorkingFile(abs);
    if (file) {
      files.push(file);
    } else {
      debug('scan', 'Skipping non-template path', { path: p });
    }
  }
  files.sort(byFilename);
  return files;
}
