/**
 * Builds configured naming conventions.
 *
 * @example
 * const factory = new GroupNamingConventionFactory({ prefix: 'jclouds' });
 * factory.create().sharedNameForGroup('mycluster');              // 'jclouds-mycluster'
 * factory.createWithoutPrefix().sharedNameForGroup('mycluster'); // 'mycluster'
 */

import { debugFormat, debugLog } from '../utils/debug.js';
import { DelimitedGroupNamingConvention } from './convention.js';
import { loadNamingOptionsFromEnv, resolveNamingOptions } from './options.js';
import { RandomSuffixGenerator } from './suffix.js';
import type { GroupNamingConvention, NamingOptions, SuffixGenerator } from './types.js';

export class GroupNamingConventionFactory {
  readonly options: NamingOptions;

  /**
   * @param overrides - Options merged onto the defaults
   * @param suffixGenerator - Suffix source shared by every convention built
   *   here. Without one, each convention gets its own random generator.
   * @throws InvalidOptionsError if the merged options are invalid
   */
  constructor(
    overrides: Partial<NamingOptions> = {},
    private readonly suffixGenerator?: SuffixGenerator,
  ) {
    this.options = resolveNamingOptions(overrides);
    debugLog('Naming options resolved', debugFormat(this.options));
  }

  create(): GroupNamingConvention {
    return new DelimitedGroupNamingConvention(this.options, this.suffixes());
  }

  /**
   * Top-level resources are already scoped unambiguously and need no
   * prefix, yet still follow the convention.
   */
  createWithoutPrefix(): GroupNamingConvention {
    return new DelimitedGroupNamingConvention(
      Object.freeze({ ...this.options, prefix: '' }),
      this.suffixes(),
    );
  }

  private suffixes(): SuffixGenerator {
    return this.suffixGenerator ?? new RandomSuffixGenerator(this.options);
  }
}

/**
 * Global singleton instance
 */
let globalInstance: GroupNamingConventionFactory | undefined;

/**
 * Get the process-wide factory, configured from GROUPNAME_* environment
 * variables on first use
 */
export function getGroupNamingConventionFactory(): GroupNamingConventionFactory {
  if (!globalInstance) {
    globalInstance = new GroupNamingConventionFactory(loadNamingOptionsFromEnv());
  }
  return globalInstance;
}

/**
 * Reset global instance (for testing)
 */
export function resetGroupNamingConventionFactory(): void {
  globalInstance = undefined;
}
