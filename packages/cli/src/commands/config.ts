import { Command } from 'commander';
import chalk from 'chalk';
import { stringify } from 'yaml';
import { getConfig, type GlobalOptions } from '../context.js';
import { getConfigPath, maskConfig } from '../config/index.js';

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Show finverdict configuration');

  config
    .command('show')
    .description('Show the effective configuration, API keys masked')
    .action((_options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const cfg = maskConfig(getConfig());

      if (globalOpts.json) {
        console.log(JSON.stringify(cfg, null, 2));
      } else {
        console.log(chalk.bold('Current configuration:\n'));
        console.log(stringify(cfg));
      }
    });

  config
    .command('path')
    .description('Print the config file location')
    .action((_options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      console.log(getConfigPath(globalOpts.config));
    });
}
