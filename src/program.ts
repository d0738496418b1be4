import { Command } from 'commander';
import { extractCommand } from './commands/extract.js';
import { matchCommand } from './commands/match.js';
import { sharedCommand } from './commands/shared.js';
import { uniqueCommand } from './commands/unique.js';
import { VERSION } from './version.js';

/**
 * Build the groupname command tree. Errors surface as rejections of
 * parseAsync; the caller decides how to exit.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('groupname')
    .description('Encode groups into provider-safe resource names and decode them back')
    .version(VERSION)
    .option('--prefix <prefix>', 'Prefix marking resources this tool manages')
    .option('--no-prefix', 'Encode and decode names without a prefix')
    .option('-d, --delimiter <char>', 'Segment delimiter')
    .option('--suffix-length <n>', 'Characters in a unique-name suffix')
    .option('--suffix-alphabet <chars>', 'Characters a suffix is drawn from')
    .option('-q, --quiet', 'Suppress non-error output')
    .option('-v, --verbose', 'Verbose output')
    .exitOverride()
    .addHelpText(
      'after',
      `
Examples:
  $ groupname shared mycluster                # jclouds-mycluster
  $ groupname unique mycluster -n 2           # jclouds-mycluster-f3e, jclouds-mycluster-e64
  $ groupname extract jclouds-mycluster-f3e   # mycluster
  $ groupname match -g mycluster $(list-security-groups)
`,
    );

  sharedCommand(program);
  uniqueCommand(program);
  extractCommand(program);
  matchCommand(program);

  return program;
}
