/**
 * Formatting and parsing of encoded names.
 *
 *   shared: [prefix<d>]group
 *   unique: [prefix<d>]group<d>suffix
 *
 * Decoding is structural. With the default '-' delimiter a group may itself
 * contain the delimiter, so the suffix is always stripped from the right:
 * 'jclouds-my-cluster-f3e' decodes to 'my-cluster'.
 */

import { debugVerbose } from '../utils/debug.js';
import { InvalidGroupError } from './errors.js';
import type { NamingOptions } from './types.js';
import { isValidGroup, isValidSuffix, validateGroup } from './validators.js';

export class GroupNameCodec {
  private readonly head: string;

  constructor(readonly options: NamingOptions) {
    this.head = options.prefix ? `${options.prefix}${options.delimiter}` : '';
  }

  /**
   * @throws InvalidGroupError
   *
   * @example
   * codec.encodeShared('mycluster') // 'jclouds-mycluster'
   */
  encodeShared(group: string): string {
    const validation = validateGroup(group);
    if (!validation.valid) {
      throw new InvalidGroupError(group, validation.errors);
    }
    return `${this.head}${group}`;
  }

  /**
   * @throws InvalidGroupError if the group is invalid, or the suffix does not
   *   fit the configured length and alphabet
   *
   * @example
   * codec.encodeUnique('mycluster', 'f3e') // 'jclouds-mycluster-f3e'
   */
  encodeUnique(group: string, suffix: string): string {
    const shared = this.encodeShared(group);
    if (!isValidSuffix(suffix, this.options)) {
      throw new InvalidGroupError(group, [
        `Suffix '${suffix}' must be ${this.options.suffixLength} characters from '${this.options.suffixAlphabet}'`,
      ]);
    }
    return `${shared}${this.options.delimiter}${suffix}`;
  }

  decodeShared(name: string): string | null {
    if (!name.startsWith(this.head)) {
      debugVerbose(`'${name}' does not start with '${this.head}'`);
      return null;
    }

    const group = name.slice(this.head.length);
    if (!isValidGroup(group)) {
      debugVerbose(`'${name}' does not hold a valid group`);
      return null;
    }
    return group;
  }

  decodeUnique(name: string): string | null {
    const { delimiter, suffixLength } = this.options;
    const boundary = name.length - suffixLength - 1;

    if (boundary < 0 || name.charAt(boundary) !== delimiter) {
      debugVerbose(`'${name}' does not end with a suffix segment`);
      return null;
    }

    const suffix = name.slice(boundary + 1);
    if (!isValidSuffix(suffix, this.options)) {
      debugVerbose(`'${name}' ends with '${suffix}', which is not a suffix`);
      return null;
    }

    return this.decodeShared(name.slice(0, boundary));
  }

  /**
   * Unique first: every unique name is also a well-formed shared name whose
   * group ends in the suffix.
   */
  extract(name: string): string | null {
    return this.decodeUnique(name) ?? this.decodeShared(name);
  }
}
