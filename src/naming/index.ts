/**
 * Group naming convention
 *
 * Turns a logical group into provider-safe resource names, and recovers the
 * group from any name it produced.
 *
 * @example
 * import { getGroupNamingConventionFactory } from './naming/index.js';
 *
 * const naming = getGroupNamingConventionFactory().create();
 *
 * naming.sharedNameForGroup('mycluster');         // 'jclouds-mycluster'
 * naming.uniqueNameForGroup('mycluster');         // 'jclouds-mycluster-f3e'
 * naming.extractGroup('jclouds-mycluster-f3e');   // 'mycluster'
 * naming.extractGroup('random-bucket-42');        // null
 */

export { GroupNameCodec } from './codec.js';
export { DelimitedGroupNamingConvention } from './convention.js';
export { InvalidGroupError, InvalidOptionsError } from './errors.js';
export {
  GroupNamingConventionFactory,
  getGroupNamingConventionFactory,
  resetGroupNamingConventionFactory,
} from './factory.js';
export {
  DEFAULT_NAMING_OPTIONS,
  loadNamingOptionsFromEnv,
  type NamingOverrides,
  namingOptionsSchema,
  parseStrictInt,
  resolveNamingOptions,
  validateOptionsSchema,
} from './options.js';
export { RandomSuffixGenerator, SequenceSuffixGenerator } from './suffix.js';
export type {
  GroupNamingConvention,
  GroupPredicate,
  NamingOptions,
  SuffixGenerator,
  ValidationResult,
} from './types.js';
export {
  isValidGroup,
  isValidSuffix,
  validateDelimiter,
  validateGroup,
  validateNamingOptions,
  validatePrefix,
  validateSuffixAlphabet,
} from './validators.js';
