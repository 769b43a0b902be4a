/**
 * Version arithmetic for sub-prompts and master prompts.
 *
 * Versions are dot-separated positive integers ("4.3.1"). Pure functions,
 * no I/O. Malformed input only ever comes from a corrupted database.
 */

import { MalformedVersionError } from '../shared/errors.js';

const SEGMENT = /^[1-9][0-9]*$/;

/**
 * Splits a version string into its numeric segments.
 *
 * @throws MalformedVersionError on an empty, zero, or non-numeric segment
 */
export function parseVersion(version: string): number[] {
  const parts = version.split('.');
  if (!parts.every((p) => SEGMENT.test(p))) {
    throw new MalformedVersionError(version);
  }
  return parts.map(Number);
}

export function formatVersion(segments: readonly number[]): string {
  return segments.join('.');
}

/**
 * Plain increment: bump the last segment, keep the segment count.
 * `null` (first revision of a type, or first master) yields "1".
 *
 * "4.3" -> "4.4", "1" -> "2"
 */
export function incrementVersion(parent: string | null): string {
  if (parent === null) {
    return '1';
  }
  const segments = parseVersion(parent);
  segments[segments.length - 1] += 1;
  return formatVersion(segments);
}

/**
 * Branch: append a new final segment `1`.
 *
 * "4.3" -> "4.3.1"
 */
export function branchVersion(parent: string): string {
  return formatVersion([...parseVersion(parent), 1]);
}

export function segmentCount(version: string): number {
  return parseVersion(version).length;
}

/**
 * True if `next` has strictly more segments than `previous`.
 * "4.3.1" vs "4.3" -> true; "4.4" vs "4.3" -> false.
 */
export function isBranched(next: string, previous: string): boolean {
  return segmentCount(next) > segmentCount(previous);
}

/**
 * Numeric segment-wise comparison; missing segments count as 0.
 * Returns a negative number, zero, or a positive number like a sort comparator.
 */
export function compareVersions(a: string, b: string): number {
  const left = parseVersion(a);
  const right = parseVersion(b);
  const len = Math.max(left.length, right.length);
  for (let i = 0; i < len; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return 0;
}

/**
 * Minimal member view used to derive a master version.
 */
export interface VersionedMember {
  type: string;
  version: string;
}

export interface MasterVersionResult {
  version: string;
  /** Types whose new member gained segments relative to the current member. */
  branchedTypes: string[];
}

/**
 * Derives the version of a proposed master.
 *
 * No current master -> "1". Otherwise the master always takes a plain
 * increment of the current master version; branch status of members is
 * reported in `branchedTypes` and never adds a segment to the master.
 */
export function deriveMasterVersion(
  currentMasterVersion: string | null,
  currentMembers: readonly VersionedMember[],
  nextMembers: readonly VersionedMember[],
): MasterVersionResult {
  if (currentMasterVersion === null) {
    return { version: '1', branchedTypes: [] };
  }

  const currentByType = new Map(currentMembers.map((m) => [m.type, m.version]));
  const branchedTypes: string[] = [];
  for (const member of nextMembers) {
    const previous = currentByType.get(member.type);
    if (previous !== undefined && isBranched(member.version, previous)) {
      branchedTypes.push(member.type);
    }
  }

  return {
    version: incrementVersion(currentMasterVersion),
    branchedTypes,
  };
}
