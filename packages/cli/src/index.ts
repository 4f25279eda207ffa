#!/usr/bin/env node

import chalk from 'chalk';
import { redactSecrets } from '@finverdict/tools';
import { createProgram } from './program.js';
import { ConfigError } from './config/index.js';

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(chalk.red(`Config error: ${error.message}`));
  } else {
    console.error(chalk.red(redactSecrets(error instanceof Error ? error.message : String(error))));
  }
  process.exit(1);
});
