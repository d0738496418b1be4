/**
 * Validation functions for groups and convention settings.
 *
 * Groups share the character set of the resource namespaces they are encoded
 * into: letters, digits and hyphens, hostname style.
 */

import type { NamingOptions, ValidationResult } from './types.js';

const SAFE_NAME = /^[A-Za-z0-9-]+$/;
const ALPHANUMERIC = /^[A-Za-z0-9]+$/;

function result(errors: string[]): ValidationResult {
  return Object.freeze({
    valid: errors.length === 0,
    errors: Object.freeze(errors),
  });
}

/**
 * Validate a group name
 *
 * Rules:
 * - Must not be empty
 * - May contain letters, numbers, hyphens
 * - Should not start or end with hyphen
 *
 * @example
 * validateGroup('my-cluster')  // { valid: true, errors: [] }
 * validateGroup('my_cluster')  // { valid: false, errors: [...] }
 */
export function validateGroup(group: string): ValidationResult {
  const errors: string[] = [];

  if (group.length === 0) {
    errors.push('Group cannot be empty');
    return result(errors);
  }

  if (!SAFE_NAME.test(group)) {
    errors.push('Group must contain only letters, numbers, and hyphens');
  }

  if (group.startsWith('-') || group.endsWith('-')) {
    errors.push('Group should not start or end with a hyphen');
  }

  return result(errors);
}

/**
 * Quick check used by decoders, which must not throw
 */
export function isValidGroup(group: string): boolean {
  return group.length > 0 && SAFE_NAME.test(group) && !group.startsWith('-') && !group.endsWith('-');
}

/**
 * Validate a prefix. The empty prefix is valid and means "no prefix".
 */
export function validatePrefix(prefix: string): ValidationResult {
  const errors: string[] = [];

  if (prefix.length > 0 && !SAFE_NAME.test(prefix)) {
    errors.push('Prefix must contain only letters, numbers, and hyphens');
  }

  return result(errors);
}

/**
 * Validate a segment delimiter
 *
 * A letter or digit would be indistinguishable from group and suffix
 * characters, so the delimiter must be punctuation.
 */
export function validateDelimiter(delimiter: string): ValidationResult {
  const errors: string[] = [];

  if (delimiter.length !== 1) {
    errors.push('Delimiter must be exactly one character');
  } else if (ALPHANUMERIC.test(delimiter)) {
    errors.push('Delimiter must not be a letter or number');
  }

  return result(errors);
}

/**
 * Validate the alphabet suffixes are drawn from
 */
export function validateSuffixAlphabet(alphabet: string): ValidationResult {
  const errors: string[] = [];

  if (!ALPHANUMERIC.test(alphabet)) {
    errors.push('Suffix alphabet must contain only letters and numbers');
  }

  const seen = new Set<string>();
  const repeated = new Set<string>();
  for (const char of alphabet) {
    if (seen.has(char)) repeated.add(char);
    seen.add(char);
  }
  if (repeated.size > 0) {
    errors.push(`Suffix alphabet repeats characters: ${[...repeated].join('')}`);
  }

  return result(errors);
}

/**
 * Check that a suffix has the configured length and only alphabet characters
 */
export function isValidSuffix(
  suffix: string,
  options: Pick<NamingOptions, 'suffixLength' | 'suffixAlphabet'>,
): boolean {
  if (suffix.length !== options.suffixLength) return false;

  for (const char of suffix) {
    if (!options.suffixAlphabet.includes(char)) return false;
  }
  return true;
}

/**
 * Run every content check on a complete set of options.
 * Types and ranges are checked by the options schema first.
 */
export function validateNamingOptions(options: NamingOptions): ValidationResult {
  return result([
    ...validatePrefix(options.prefix).errors,
    ...validateDelimiter(options.delimiter).errors,
    ...validateSuffixAlphabet(options.suffixAlphabet).errors,
  ]);
}
