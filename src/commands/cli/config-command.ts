/**
 * CLI `smart-command config` command
 *
 * Shows the effective configuration and where it is read from.
 */

import type { Command } from 'commander';
import { getConfigFilePath, loadAppConfig } from '../../config/app-config.js';
import { toOverrides, type GlobalOptions } from '../../cli/config-loader.js';

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Inspect configuration');

  config
    .command('show')
    .description('Print the effective configuration as JSON')
    .action(async () => {
      const effective = await loadAppConfig({ overrides: toOverrides(program.opts<GlobalOptions>()) });
      console.log(JSON.stringify(effective, null, 2));
    });

  config
    .command('path')
    .description('Print the config file location')
    .action(() => {
      console.log(getConfigFilePath());
    });
}
