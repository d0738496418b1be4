import type { Command } from 'commander';
import { output } from '../utils/output.js';
import { CommandError } from './command-error.js';
import { conventionFor } from './global-options.js';

interface MatchOptions {
  group?: string;
}

export function matchCommand(program: Command): void {
  // match <names...> [--group <group>]
  program
    .command('match <names...>')
    .description('Print the names that carry a group (any group unless --group is given)')
    .option('-g, --group <group>', 'Only match names carrying this group')
    .action((names: string[], options: MatchOptions, command: Command) => {
      const naming = conventionFor(command);
      const matches =
        options.group === undefined ? naming.containsAnyGroup() : naming.containsGroup(options.group);

      const matched = names.filter(matches);
      for (const name of matched) {
        output.result(name);
      }

      if (matched.length === 0) {
        throw new CommandError(
          options.group === undefined
            ? 'No names carry a group'
            : `No names carry group '${options.group}'`,
        );
      }
    });
}
