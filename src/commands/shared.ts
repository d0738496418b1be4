import type { Command } from 'commander';
import { output } from '../utils/output.js';
import { conventionFor } from './global-options.js';

export function sharedCommand(program: Command): void {
  // shared <group>
  program
    .command('shared <group>')
    .description('Print the name of a resource shared by every member of a group')
    .action((group: string, _options: unknown, command: Command) => {
      const naming = conventionFor(command);
      output.result(naming.sharedNameForGroup(group));
    });
}
