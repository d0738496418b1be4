import { GroupNameCodec } from './codec.js';
import type { GroupNamingConvention, GroupPredicate, NamingOptions, SuffixGenerator } from './types.js';

/**
 * Default convention: delimited segments with a random suffix on unique
 * names. Stateless apart from the suffix source.
 */
export class DelimitedGroupNamingConvention implements GroupNamingConvention {
  private readonly codec: GroupNameCodec;

  constructor(
    options: NamingOptions,
    private readonly suffixes: SuffixGenerator,
  ) {
    this.codec = new GroupNameCodec(options);
  }

  sharedNameForGroup(group: string): string {
    return this.codec.encodeShared(group);
  }

  uniqueNameForGroup(group: string): string {
    return this.codec.encodeUnique(group, this.suffixes.next());
  }

  groupInSharedNameOrNull(encoded: string): string | null {
    return this.codec.decodeShared(encoded);
  }

  groupInUniqueNameOrNull(encoded: string): string | null {
    return this.codec.decodeUnique(encoded);
  }

  extractGroup(encoded: string): string | null {
    return this.codec.extract(encoded);
  }

  containsGroup(group: string): GroupPredicate {
    return (input) => this.extractGroup(input) === group;
  }

  containsAnyGroup(): GroupPredicate {
    return (input) => this.extractGroup(input) !== null;
  }
}
