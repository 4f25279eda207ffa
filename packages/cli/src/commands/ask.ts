import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import { z } from 'zod';
import { formatJson, type HistoryTurn, type PipelineResult } from '@finverdict/core';
import { redactSecrets } from '@finverdict/tools';
import { getConfig, type GlobalOptions } from '../context.js';
import { ConfigError } from '../config/index.js';
import { createServices } from '../services.js';
import { attachPipelineLogging, createLogger } from '../logging.js';
import { renderResult } from '../render.js';
import { parsePositiveInt } from './options.js';

interface AskOptions {
  history?: string;
  topK?: number;
}

const HistorySchema = z.array(
  z.object({
    role: z.enum(['user', 'assistant']),
    content: z.string(),
  }).strict(),
);

/** Read prior conversation turns from a JSON file. */
export function loadHistory(path: string): HistoryTurn[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Failed to read history file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = HistorySchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || 'history'}: ${i.message}`).join(', ');
    throw new ConfigError(`Invalid history file ${path}: ${issues}`);
  }
  return parsed.data;
}

export function registerAskCommand(program: Command): void {
  program
    .command('ask')
    .description('Answer a question or check a claim about a company or the market')
    .argument('<query...>', 'Question or claim, e.g. "Is Tesla stock up today?"')
    .option('--history <file>', 'JSON file with prior turns: [{"role":"user","content":"..."}]')
    .option('-k, --top-k <n>', 'Evidence chunks to retrieve', parsePositiveInt)
    .action(async (words: string[], options: AskOptions, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const config = getConfig();
      const logger = createLogger({ verbose: globalOpts.verbose });
      const query = words.join(' ').trim();

      const history = options.history ? loadHistory(options.history) : undefined;
      const { pipeline } = await createServices(config, {
        onEmbedFailure: (message) => logger.warn(`Embedding failed: ${message}`),
      });
      attachPipelineLogging(pipeline, logger);

      const controller = new AbortController();
      const onSigint = () => controller.abort();
      process.once('SIGINT', onSigint);

      let result: PipelineResult;
      try {
        result = await pipeline.runPipeline(query, {
          history,
          topK: options.topK,
          abortSignal: controller.signal,
        });
      } catch (err) {
        const message = redactSecrets(err instanceof Error ? err.message : String(err));
        if (globalOpts.json) {
          console.log(JSON.stringify({ error: message }));
        } else {
          logger.error(message);
        }
        process.exitCode = 1;
        return;
      } finally {
        process.off('SIGINT', onSigint);
      }

      if (globalOpts.json) {
        console.log(formatJson(result));
        return;
      }
      console.log('');
      console.log(renderResult(result, { details: globalOpts.verbose, width: process.stdout.columns }));
      console.log('');
    });
}
