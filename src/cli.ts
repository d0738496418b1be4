#!/usr/bin/env node

import { CommanderError } from 'commander';
import { CommandError } from './commands/command-error.js';
import { createProgram } from './program.js';
import { debugError } from './utils/debug.js';
import { output } from './utils/output.js';

const program = createProgram();

try {
  await program.parseAsync();
} catch (err) {
  if (err instanceof CommanderError) {
    // Commander has already printed help, version or its own error
    process.exit(err.exitCode);
  }

  debugError('Command failed', err);
  output.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(err instanceof CommandError ? err.exitCode : 1);
}
