import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigError, loadConfigWithMeta } from './config/index.js';
import { setConfig, type GlobalOptions } from './context.js';
import { hasAnyProviderKey } from './services.js';
import { registerAskCommand } from './commands/ask.js';
import { registerServeCommand } from './commands/serve.js';
import { registerIndexCommand } from './commands/index-store.js';
import { registerConfigCommand } from './commands/config.js';
import { VERSION } from './version.js';

/** Commands that call a language model. */
const MODEL_COMMANDS = new Set(['ask', 'serve']);

export function createProgram(): Command {
  const program = new Command();

  program
    .name('finverdict')
    .description('Grounded, self-verifying answers to questions about markets and companies')
    .version(VERSION)
    .option('-v, --verbose', 'Show stage timings and provider failures')
    .option('--json', 'Machine-readable JSON output')
    .option('-c, --config <path>', 'Path to config file');

  registerAskCommand(program);
  registerServeCommand(program);
  registerIndexCommand(program);
  registerConfigCommand(program);

  program.hook('preAction', (_thisCommand, actionCommand) => {
    const chain = getCommandChain(actionCommand, program);

    // 'config path' must work even when the file is broken
    if (chain[0] === 'config' && chain[1] === 'path') {
      return;
    }

    const opts = actionCommand.optsWithGlobals<GlobalOptions>();
    const { config, configFileExists, envKeysUsed } = loadConfigWithMeta({ configPath: opts.config });

    if (!configFileExists && envKeysUsed.length > 0 && !opts.json) {
      console.error(chalk.cyan(`  Using ${envKeysUsed.join(', ')} from environment.`));
    }

    if (MODEL_COMMANDS.has(chain[0]) && !hasAnyProviderKey(config)) {
      throw new ConfigError(
        'No model API key found. Set ANTHROPIC_API_KEY, OPENAI_API_KEY or GEMINI_API_KEY, ' +
          'or providers.<name>.api_key in ~/.finverdict/config.yaml',
      );
    }

    setConfig(config);
  });

  return program;
}

export function getCommandChain(cmd: Command, root: Command): string[] {
  const chain: string[] = [];
  let current: Command | null = cmd;
  while (current && current !== root) {
    chain.unshift(current.name());
    current = current.parent;
  }
  return chain;
}
