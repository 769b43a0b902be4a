import { describe, it, expect } from 'vitest';

import {
  indexToPrefix,
  parseFilename,
  typeToFilename,
  validatePrefixes,
} from '../filenames.js';
import { FilenameValidationError } from '../../shared/errors.js';

function files(...names: string[]): { filename: string; prefix: string }[] {
  return names.map((filename) => ({ filename, prefix: filename.slice(0, filename.indexOf('_')) }));
}

describe('parseFilename', () => {
  it('takes everything after the first underscore as the type', () => {
    expect(parseFilename('01_intro.j2')).toEqual({ prefix: '01', type: 'intro' });
    expect(parseFilename('02_intro_section.j2')).toEqual({ prefix: '02', type: 'intro_section' });
  });

  it('returns null for non-template names', () => {
    expect(parseFilename('01_intro.txt')).toBeNull();
    expect(parseFilename('intro.j2')).toBeNull();
    expect(parseFilename('01_.j2')).toBeNull();
  });
});

describe('indexToPrefix / typeToFilename', () => {
  it('pads to at least two digits', () => {
    expect(indexToPrefix(0, 3)).toBe('01');
    expect(indexToPrefix(8, 9)).toBe('09');
  });

  it('widens with the total', () => {
    expect(indexToPrefix(4, 100)).toBe('005');
    expect(indexToPrefix(99, 100)).toBe('100');
  });

  it('builds filenames from type and position', () => {
    expect(typeToFilename('intro', 0, 2)).toBe('01_intro.j2');
    expect(typeToFilename('outro_notes', 1, 2)).toBe('02_outro_notes.j2');
  });
});

describe('validatePrefixes', () => {
  it('accepts consecutive prefixes of one width in any order', () => {
    expect(() => validatePrefixes(files('02_b.j2', '01_a.j2', '03_c.j2'))).not.toThrow();
    expect(() => validatePrefixes([])).not.toThrow();
  });

  it('rejects non-numeric prefixes', () => {
    expect(() => validatePrefixes(files('ab_x.j2'))).toThrow('Filename prefix must be numeric: ab_x.j2');
  });

  it('rejects mixed widths', () => {
    expect(() => validatePrefixes(files('01_a.j2', '2_b.j2'))).toThrow(
      'Filename prefixes must all have the same width: 01_a.j2, 2_b.j2',
    );
  });

  it('rejects duplicate prefixes', () => {
    expect(() => validatePrefixes(files('01_a.j2', '01_b.j2'))).toThrow(
      'Duplicate filename prefix 01: 01_a.j2, 01_b.j2',
    );
  });

  it('rejects gaps', () => {
    expect(() => validatePrefixes(files('01_a.j2', '03_c.j2'))).toThrow(
      'Filename prefixes must be consecutive from 01; missing 02',
    );
  });

  it('rejects sequences that do not start at 1', () => {
    expect(() => validatePrefixes(files('00_a.j2', '01_b.j2'))).toThrow(FilenameValidationError);
  });
});
