import { Command } from 'commander';
import chalk from 'chalk';
import { getConfig, type GlobalOptions } from '../context.js';
import { createRunner, createServices } from '../services.js';
import { attachPipelineLogging, createLogger } from '../logging.js';
import { startVerdictServer } from '../web/server.js';
import { parsePortOption } from './options.js';
import { VERSION } from '../version.js';

interface ServeOptions {
  port?: number;
  host?: string;
}

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Serve verdicts over HTTP (GET /health, POST /api/verify)')
    .option('-p, --port <n>', 'Port to listen on', parsePortOption)
    .option('--host <host>', 'Interface to bind', '127.0.0.1')
    .action(async (options: ServeOptions, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const config = getConfig();
      const logger = createLogger({ verbose: globalOpts.verbose });

      const { pipeline } = await createServices(config, {
        onEmbedFailure: (message) => logger.warn(`Embedding failed: ${message}`),
      });
      attachPipelineLogging(pipeline, logger);

      const { ready, close } = startVerdictServer({
        service: pipeline,
        runner: createRunner(config),
        port: options.port ?? config.server.port,
        host: options.host,
        version: VERSION,
        logger,
      });

      const port = await ready;
      console.error(chalk.green(`  finverdict listening on http://${options.host ?? '127.0.0.1'}:${port}`));

      await new Promise<void>((resolve, reject) => {
        const shutdown = () => {
          console.error(chalk.dim('  Shutting down...'));
          close().then(resolve, reject);
        };
        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);
      });
    });
}
