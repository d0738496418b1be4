import type { Command } from 'commander';
import { parseStrictInt } from '../naming/index.js';
import { output } from '../utils/output.js';
import { CommandError } from './command-error.js';
import { conventionFor } from './global-options.js';

interface UniqueOptions {
  count: string;
}

export function uniqueCommand(program: Command): void {
  // unique <group> [--count <n>]
  program
    .command('unique <group>')
    .description('Print names for resources created once per group member')
    .option('-n, --count <n>', 'Number of names to print', '1')
    .action((group: string, options: UniqueOptions, command: Command) => {
      const count = parseStrictInt(options.count);
      if (!Number.isInteger(count) || count < 1) {
        throw new CommandError(`--count must be a positive integer, got '${options.count}'`);
      }

      const naming = conventionFor(command);
      for (let i = 0; i < count; i++) {
        output.result(naming.uniqueNameForGroup(group));
      }
    });
}
