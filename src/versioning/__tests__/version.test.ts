import { describe, it, expect } from 'vitest';

import {
  branchVersion,
  compareVersions,
  deriveMasterVersion,
  incrementVersion,
  isBranched,
  parseVersion,
} from '../version.js';
import { MalformedVersionError } from '../../shared/errors.js';

describe('parseVersion', () => {
  it('splits dotted versions into numbers', () => {
    expect(parseVersion('4.3.1')).toEqual([4, 3, 1]);
    expect(parseVersion('12')).toEqual([12]);
  });

  it('rejects empty, zero, and non-numeric segments', () => {
    for (const bad of ['', '1..2', '1.', '.1', '1.a', '0', '1.0', '01', '-1', '1.2 ']) {
      expect(() => parseVersion(bad)).toThrow(MalformedVersionError);
    }
  });
});

describe('incrementVersion', () => {
  it('returns "1" for the first revision', () => {
    expect(incrementVersion(null)).toBe('1');
  });

  it('bumps the last segment and keeps the segment count', () => {
    expect(incrementVersion('1')).toBe('2');
    expect(incrementVersion('4.23')).toBe('4.24');
    expect(incrementVersion('4.3.9')).toBe('4.3.10');
  });

  it('throws on corrupted input', () => {
    expect(() => incrementVersion('4.x')).toThrow(MalformedVersionError);
  });
});

describe('branchVersion', () => {
  it('appends a new segment 1', () => {
    expect(branchVersion('4.3')).toBe('4.3.1');
    expect(branchVersion('1')).toBe('1.1');
    expect(branchVersion('2.1.1')).toBe('2.1.1.1');
  });
});

describe('isBranched', () => {
  it('is true only when the new version has more segments', () => {
    expect(isBranched('4.3.1', '4.3')).toBe(true);
    expect(isBranched('4.4', '4.3')).toBe(false);
    expect(isBranched('4.3', '4.3')).toBe(false);
    expect(isBranched('5', '4.3')).toBe(false);
  });
});

describe('compareVersions', () => {
  it('orders segment-wise with missing segments as zero', () => {
    expect(compareVersions('4.4', '4.3')).toBeGreaterThan(0);
    expect(compareVersions('4.3.1', '4.3')).toBeGreaterThan(0);
    expect(compareVersions('4.3', '4.10')).toBeLessThan(0);
    expect(compareVersions('2', '2')).toBe(0);
  });
});

describe('deriveMasterVersion', () => {
  it('starts at "1" with no current master', () => {
    expect(
      deriveMasterVersion(null, [], [{ type: 'intro', version: '1' }]),
    ).toEqual({ version: '1', branchedTypes: [] });
  });

  it('increments when no member branched', () => {
    expect(
      deriveMasterVersion(
        '3',
        [{ type: 'intro', version: '1' }],
        [{ type: 'intro', version: '2' }],
      ),
    ).toEqual({ version: '4', branchedTypes: [] });
  });

  it('still increments, and reports the type, when a member branched', () => {
    expect(
      deriveMasterVersion(
        '7',
        [
          { type: 'intro', version: '4.3' },
          { type: 'body', version: '2' },
        ],
        [
          { type: 'intro', version: '4.3.1' },
          { type: 'body', version: '2' },
        ],
      ),
    ).toEqual({ version: '8', branchedTypes: ['intro'] });
  });

  it('does not classify newly added types as branched', () => {
    expect(
      deriveMasterVersion('1', [], [{ type: 'outro', version: '1.1' }]),
    ).toEqual({ version: '2', branchedTypes: [] });
  });
});
