/**
 * CLI `smart-command complete` command
 *
 * Prints the suggestions the engine produces for a line, one per line.
 */

import type { Command } from 'commander';
import { bootstrap, type GlobalOptions } from '../../cli/config-loader.js';
import { formatSuggestion } from '../../cli/format.js';

export function registerCompleteCommand(program: Command): void {
  program
    .command('complete')
    .description('Show completions for a partial command line')
    .argument('<line>', 'Input line, quoted as one argument')
    .option('-c, --cursor <offset>', 'Cursor offset in the line (default: end of line)')
    .option('--json', 'Output suggestions as JSON')
    .action(async (line: string, opts: { cursor?: string; json?: boolean }) => {
      const { session } = await bootstrap(program.opts<GlobalOptions>());

      const cursor = opts.cursor !== undefined ? Number.parseInt(opts.cursor, 10) : line.length;
      if (Number.isNaN(cursor)) {
        program.error(`Invalid cursor offset: ${opts.cursor}`);
      }

      const suggestions = session.complete(line, cursor);

      if (opts.json) {
        console.log(JSON.stringify(suggestions, null, 2));
        return;
      }
      for (const suggestion of suggestions) {
        console.log(formatSuggestion(suggestion));
      }
    });
}
