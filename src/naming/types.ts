/**
 * Type definitions for the group naming convention.
 *
 * A convention encodes a logical group into provider-safe resource names and
 * decodes them back. Shared names exist once per group; unique names are
 * created many times per group and carry a random suffix.
 */

/**
 * Settings every convention instance is built from
 */
export interface NamingOptions {
  /** Literal marker for resources this system created, or '' for none: "jclouds" */
  readonly prefix: string;

  /** Single separator character between segments: "-" */
  readonly delimiter: string;

  /** Number of characters in a unique-name suffix: 3 */
  readonly suffixLength: number;

  /** Characters a suffix is drawn from: "0123456789abcdef" */
  readonly suffixAlphabet: string;
}

/**
 * Source of suffix tokens for unique names
 */
export interface SuffixGenerator {
  next(): string;
}

/**
 * Membership test over encoded names
 */
export type GroupPredicate = (input: string) => boolean;

/**
 * Encodes groups into resource names and recovers them.
 *
 * Decoders return null for any input not produced by this convention,
 * including names a user created by hand.
 */
export interface GroupNamingConvention {
  /**
   * Encode a group into a name that exists only once in the group
   *
   * @throws InvalidGroupError if the group is empty or uses other characters
   *   than letters, digits and hyphens
   *
   * @example
   * convention.sharedNameForGroup('mycluster') // 'jclouds-mycluster'
   */
  sharedNameForGroup(group: string): string;

  /**
   * Encode a group into a name that exists more than once in the group.
   *
   * Uniqueness is not guaranteed; a caller that hits a name conflict asks
   * again.
   *
   * @example
   * convention.uniqueNameForGroup('mycluster') // 'jclouds-mycluster-f3e'
   */
  uniqueNameForGroup(group: string): string;

  groupInSharedNameOrNull(encoded: string): string | null;

  groupInUniqueNameOrNull(encoded: string): string | null;

  /**
   * Recover the group from a shared or unique name. Unique names are tried
   * first, since every unique name also reads as a shared one.
   */
  extractGroup(encoded: string): string | null;

  /** Predicate true for names that carry the given group */
  containsGroup(group: string): GroupPredicate;

  /** Predicate true for names that carry any group at all */
  containsAnyGroup(): GroupPredicate;
}

/**
 * Validation result
 */
export interface ValidationResult {
  readonly valid: boolean;
  readonly errors: readonly string[];
}
