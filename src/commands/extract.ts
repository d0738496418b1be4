import type { Command } from 'commander';
import type { GroupNamingConvention } from '../naming/index.js';
import { output } from '../utils/output.js';
import { CommandError } from './command-error.js';
import { conventionFor } from './global-options.js';

export type ExtractMode = 'shared' | 'unique' | 'any';

const MODES: readonly ExtractMode[] = ['shared', 'unique', 'any'];

interface ExtractOptions {
  mode: string;
}

function isExtractMode(mode: string): mode is ExtractMode {
  return MODES.some((m) => m === mode);
}

export function decoderFor(
  naming: GroupNamingConvention,
  mode: ExtractMode,
): (encoded: string) => string | null {
  switch (mode) {
    case 'shared':
      return (encoded) => naming.groupInSharedNameOrNull(encoded);
    case 'unique':
      return (encoded) => naming.groupInUniqueNameOrNull(encoded);
    case 'any':
      return (encoded) => naming.extractGroup(encoded);
  }
}

export function extractCommand(program: Command): void {
  // extract <names...> [--mode shared|unique|any]
  program
    .command('extract <names...>')
    .description('Print the group encoded in each name')
    .option('-m, --mode <mode>', `Name shape to decode: ${MODES.join('|')}`, 'any')
    .action((names: string[], options: ExtractOptions, command: Command) => {
      if (!isExtractMode(options.mode)) {
        throw new CommandError(`--mode must be one of: ${MODES.join(', ')}`);
      }

      const decode = decoderFor(conventionFor(command), options.mode);
      let misses = 0;

      for (const name of names) {
        const group = decode(name);
        if (group === null) {
          misses++;
          output.warn(`'${name}' holds no group`);
        } else {
          output.result(group);
        }
      }

      if (misses > 0) {
        throw new CommandError(`${misses} of ${names.length} names hold no group`);
      }
    });
}
