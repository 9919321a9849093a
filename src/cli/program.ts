/**
 * Command-line program definition
 */

import { Command } from 'commander';
import { registerCatalogCommands } from '../commands/cli/catalog-commands.js';
import { registerCompleteCommand } from '../commands/cli/complete-command.js';
import { registerConfigCommand } from '../commands/cli/config-command.js';
import { registerSearchCommand, type LinePrompt } from '../commands/cli/search-command.js';

export const VERSION = '0.3.0';

export interface ProgramOptions {
  /** Prompt used by `search --select` (default: readline over stdin/stdout) */
  createPrompt?: () => LinePrompt;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command();

  program
    .name('smart-command')
    .description('Context-aware command completion from declarative command definitions')
    .version(VERSION)
    .option('-l, --lang <code>', 'Display language for descriptions (e.g. en, zh)')
    .option('-d, --definitions <dir>', 'Definitions directory searched before all others')
    .option('--no-builtins', 'Do not load the built-in definitions')
    .option('-v, --verbose', 'Log loader and completion details to stderr');

  registerCompleteCommand(program);
  registerSearchCommand(program, options.createPrompt);
  registerCatalogCommands(program);
  registerConfigCommand(program);

  return program;
}
