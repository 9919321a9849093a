/**
 * CLI catalog commands: list, examples, validate
 */

import chalk from 'chalk';
import type { Command } from 'commander';
import { bootstrap, type GlobalOptions } from '../../cli/config-loader.js';
import { formatCommandTree, formatDiagnostic } from '../../cli/format.js';

export function registerCatalogCommands(program: Command): void {
  program
    .command('list')
    .description('Show the command tree, or the subtree at a command path')
    .argument('[path...]', 'Command path, e.g. "git remote"')
    .action(async (commandPath: string[]) => {
      const { session } = await bootstrap(program.opts<GlobalOptions>());
      const lang = session.getLanguage();

      if (commandPath.length === 0) {
        for (const root of session.catalog.roots) {
          console.log(formatCommandTree(root, lang).join('\n'));
        }
        console.log(chalk.dim(`\n${session.catalog.size} command(s)`));
        return;
      }

      const command = session.catalog.resolve(commandPath);
      if (!command) {
        program.error(`Unknown command: ${commandPath.join(' ')}`);
      }
      console.log(formatCommandTree(command, lang).join('\n'));
    });

  program
    .command('examples')
    .description('Show examples of a command, or list the commands that have examples')
    .argument('[path...]', 'Command path, e.g. "git commit"')
    .action(async (commandPath: string[]) => {
      const { session } = await bootstrap(program.opts<GlobalOptions>());

      if (commandPath.length === 0) {
        for (const path of session.catalog.commandsWithExamples()) {
          console.log(path);
        }
        return;
      }

      const examples = session.catalog.examplesFor(commandPath.join(' '), session.getLanguage());
      if (examples.length === 0) {
        console.log(chalk.yellow(`No examples for ${commandPath.join(' ')}`));
        return;
      }
      for (const example of examples) {
        console.log(`${chalk.bold(example.cmd)}${example.scenario ? `\n  ${chalk.dim(example.scenario)}` : ''}`);
      }
    });

  program
    .command('validate')
    .description('Load every definition source and report problems')
    .option('--json', 'Output sources and diagnostics as JSON')
    .action(async (opts: { json?: boolean }) => {
      const { load } = await bootstrap(program.opts<GlobalOptions>());
      const errors = load.diagnostics.filter((d) => d.kind === 'error').length;
      if (errors > 0) {
        process.exitCode = 1;
      }

      if (opts.json) {
        // Errors serialise through SmartCommandError.toJSON
        console.log(JSON.stringify({ sources: load.sources, diagnostics: load.diagnostics }, null, 2));
        return;
      }

      for (const source of load.sources) {
        console.log(`${chalk.green('loaded')} ${source.location} (${source.commands} command(s))`);
      }
      for (const diagnostic of load.diagnostics) {
        console.log(formatDiagnostic(diagnostic));
      }

      console.log(`\n  Summary: ${load.catalog.size} command(s), ${errors} error(s)\n`);
    });
}
