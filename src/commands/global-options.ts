/**
 * Turns the program-wide flags into a configured naming convention.
 * Flags override GROUPNAME_* environment variables.
 */

import type { Command } from 'commander';
import {
  type GroupNamingConvention,
  GroupNamingConventionFactory,
  loadNamingOptionsFromEnv,
  type NamingOverrides,
  parseStrictInt,
} from '../naming/index.js';
import { debugFormat, debugLog } from '../utils/debug.js';
import { output } from '../utils/output.js';

export interface GlobalOptions {
  overrides: NamingOverrides;
  withPrefix: boolean;
}

export function readGlobalOptions(command: Command): GlobalOptions {
  const opts: Record<string, unknown> = command.optsWithGlobals();

  if (opts.quiet === true) {
    output.setLevel('quiet');
  } else if (opts.verbose === true) {
    output.setLevel('verbose');
  }

  const overrides = loadNamingOptionsFromEnv();

  if (typeof opts.prefix === 'string') {
    overrides.prefix = opts.prefix;
  }
  if (typeof opts.delimiter === 'string') {
    overrides.delimiter = opts.delimiter;
  }
  if (typeof opts.suffixLength === 'string') {
    overrides.suffixLength = parseStrictInt(opts.suffixLength);
  }
  if (typeof opts.suffixAlphabet === 'string') {
    overrides.suffixAlphabet = opts.suffixAlphabet;
  }

  // --no-prefix stores false under the same key
  return { overrides, withPrefix: opts.prefix !== false };
}

/**
 * Build the convention a subcommand works with
 *
 * @throws InvalidOptionsError if flags or environment give invalid options
 */
export function conventionFor(command: Command): GroupNamingConvention {
  const { overrides, withPrefix } = readGlobalOptions(command);
  debugLog(`Running '${command.name()}'`, debugFormat({ overrides, withPrefix }));

  const factory = new GroupNamingConventionFactory(overrides);
  output.verbose(`Prefix: ${withPrefix && factory.options.prefix ? factory.options.prefix : '(none)'}`);
  output.verbose(`Delimiter: ${factory.options.delimiter}`);
  output.verbose(
    `Suffix: ${factory.options.suffixLength} of '${factory.options.suffixAlphabet}'`,
  );

  return withPrefix ? factory.create() : factory.createWithoutPrefix();
}
