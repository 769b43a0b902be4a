/**
 * Template filename conventions: `<prefix>_<type>.j2`.
 *
 * The type is everything after the first underscore, so `01_intro_section.j2`
 * has type `intro_section`. The numeric prefix orders sub-prompts within the
 * master prompt.
 */

import { FilenameValidationError } from '../shared/errors.js';

export const TEMPLATE_EXTENSION = '.j2';

export interface ParsedFilename {
  prefix: string;
  type: string;
}

/**
 * Splits a template filename into prefix and type.
 * Returns null for anything that is not a template file (no `.j2`
 * suffix, no underscore, or an empty type).
 */
export function parseFilename(filename: string): ParsedFilename | null {
  if (!filename.endsWith(TEMPLATE_EXTENSION)) {
    return null;
  }
  const stem = filename.slice(0, -TEMPLATE_EXTENSION.length);
  const sep = stem.indexOf('_');
  if (sep < 0) {
    return null;
  }
  const type = stem.slice(sep + 1);
  if (type.length === 0) {
    return null;
  }
  return { prefix: stem.slice(0, sep), type };
}

/**
 * Zero-padded prefix for the sub-prompt at 0-based `index` out of `total`.
 * At least two digits: 01, 02, ..., 99, 100.
 */
export function indexToPrefix(index: number, total: number): string {
  const width = Math.max(2, String(total).length);
  return String(index + 1).padStart(width, '0');
}

/**
 * Inverse of parseFilename for extract: type + position -> `NN_<type>.j2`.
 */
export function typeToFilename(type: string, index: number, total: number): string {
  return `${indexToPrefix(index, total)}_${type}${TEMPLATE_EXTENSION}`;
}

/**
 * Numeric value of a prefix.
 *
 * @throws FilenameValidationError when the prefix is not all digits
 */
export function prefixPosition(prefix: string, filename: string): number {
  if (!/^[0-9]+$/.test(prefix)) {
    throw new FilenameValidationError(
      `Filename prefix must be numeric: ${filename}`,
      [filename],
    );
  }
  return Number(prefix);
}

/**
 * Checks the prefixes of a whole working set:
 *   1. every prefix is numeric
 *   2. every prefix has the same width (01 and 1 may not mix)
 *   3. no prefix repeats
 *   4. prefixes run consecutively from 1
 *
 * @throws FilenameValidationError describing the first rule broken
 */
export function validatePrefixes(files: readonly { filename: string; prefix: string }[]): void {
  if (files.length === 0) {
    return;
  }

  for (const f of files) {
    prefixPosition(f.prefix, f.filename);
  }

  const widths = new Set(files.map((f) => f.prefix.length));
  if (widths.size > 1) {
    throw new FilenameValidationError(
      `Filename prefixes must all have the same width: ${files.map((f) => f.filename).join(', ')}`,
      files.map((f) => f.filename),
    );
  }

  const byPrefix = new Map<string, string[]>();
  for (const f of files) {
    const names = byPrefix.get(f.prefix) ?? [];
    names.push(f.filename);
    byPrefix.set(f.prefix, names);
  }
  for (const [prefix, names] of byPrefix) {
    if (names.length > 1) {
      throw new FilenameValidationError(
        `Duplicate filename prefix ${prefix}: ${names.join(', ')}`,
        names,
      );
    }
  }

  const width = files[0].prefix.length;
  const present = new Set(files.map((f) => Number(f.prefix)));
  const missing: string[] = [];
  for (let n = 1; n <= files.length; n++) {
    if (!present.has(n)) {
      missing.push(String(n).padStart(width, '0'));
    }
  }
  if (missing.length > 0) {
    throw new FilenameValidationError(
      `Filename prefixes must be consecutive from ${'1'.padStart(width, '0')}; missing ${missing.join(', ')}`,
      files.map((f) => f.filename),
    );
  }
}
