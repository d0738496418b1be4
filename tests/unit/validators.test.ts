import { describe, expect, test } from 'vitest';
import { DEFAULT_NAMING_OPTIONS } from '../../src/naming/options.js';
import {
  isValidGroup,
  isValidSuffix,
  validateDelimiter,
  validateGroup,
  validateNamingOptions,
  validatePrefix,
  validateSuffixAlphabet,
} from '../../src/naming/validators.js';

describe('validateGroup', () => {
  test('accepts letters, numbers and inner hyphens', () => {
    expect(validateGroup('my-cluster')).toEqual({ valid: true, errors: [] });
    expect(validateGroup('Web01')).toEqual({ valid: true, errors: [] });
  });

  test('rejects empty group', () => {
    expect(validateGroup('')).toEqual({ valid: false, errors: ['Group cannot be empty'] });
  });

  test('rejects other characters', () => {
    expect(validateGroup('my_cluster').errors).toEqual([
      'Group must contain only letters, numbers, and hyphens',
    ]);
  });

  test('rejects leading and trailing hyphens', () => {
    expect(validateGroup('-edge-').errors).toEqual(['Group should not start or end with a hyphen']);
  });

  test('collects every error', () => {
    expect(validateGroup('-bad_').errors).toEqual([
      'Group must contain only letters, numbers, and hyphens',
      'Group should not start or end with a hyphen',
    ]);
  });

  test('returns frozen result', () => {
    const validation = validateGroup('mycluster');
    expect(Object.isFrozen(validation)).toBe(true);
    expect(Object.isFrozen(validation.errors)).toBe(true);
  });
});

describe('isValidGroup', () => {
  test('agrees with validateGroup', () => {
    for (const group of ['', 'a', 'my-cluster', '-a', 'a-', 'a.b', 'Web01']) {
      expect(isValidGroup(group)).toBe(validateGroup(group).valid);
    }
  });
});

describe('validatePrefix', () => {
  test('accepts empty and hostname-style prefixes', () => {
    expect(validatePrefix('').valid).toBe(true);
    expect(validatePrefix('jclouds').valid).toBe(true);
    expect(validatePrefix('my-tool').valid).toBe(true);
  });

  test('rejects other characters', () => {
    expect(validatePrefix('my tool').errors).toEqual([
      'Prefix must contain only letters, numbers, and hyphens',
    ]);
  });
});

describe('validateDelimiter', () => {
  test('accepts single punctuation characters', () => {
    expect(validateDelimiter('-').valid).toBe(true);
    expect(validateDelimiter('#').valid).toBe(true);
    expect(validateDelimiter('_').valid).toBe(true);
  });

  test('rejects anything but one character', () => {
    expect(validateDelimiter('').errors).toEqual(['Delimiter must be exactly one character']);
    expect(validateDelimiter('--').errors).toEqual(['Delimiter must be exactly one character']);
  });

  test('rejects letters and numbers', () => {
    expect(validateDelimiter('x').errors).toEqual(['Delimiter must not be a letter or number']);
    expect(validateDelimiter('7').errors).toEqual(['Delimiter must not be a letter or number']);
  });
});

describe('validateSuffixAlphabet', () => {
  test('accepts hex digits', () => {
    expect(validateSuffixAlphabet('0123456789abcdef').valid).toBe(true);
  });

  test('rejects repeated characters', () => {
    expect(validateSuffixAlphabet('aab').errors).toEqual(['Suffix alphabet repeats characters: a']);
  });

  test('rejects punctuation', () => {
    expect(validateSuffixAlphabet('ab-').errors).toEqual([
      'Suffix alphabet must contain only letters and numbers',
    ]);
  });
});

describe('isValidSuffix', () => {
  test('checks length and alphabet', () => {
    expect(isValidSuffix('f3e', DEFAULT_NAMING_OPTIONS)).toBe(true);
    expect(isValidSuffix('f3', DEFAULT_NAMING_OPTIONS)).toBe(false);
    expect(isValidSuffix('F3E', DEFAULT_NAMING_OPTIONS)).toBe(false);
    expect(isValidSuffix('g3e', DEFAULT_NAMING_OPTIONS)).toBe(false);
  });
});

describe('validateNamingOptions', () => {
  test('accepts defaults', () => {
    expect(validateNamingOptions(DEFAULT_NAMING_OPTIONS).valid).toBe(true);
  });

  test('collects errors from every setting', () => {
    const validation = validateNamingOptions({
      prefix: 'a b',
      delimiter: 'x',
      suffixLength: 3,
      suffixAlphabet: 'aab',
    });

    expect(validation.errors).toEqual([
      'Prefix must contain only letters, numbers, and hyphens',
      'Delimiter must not be a letter or number',
      'Suffix alphabet repeats characters: a',
    ]);
  });
});
