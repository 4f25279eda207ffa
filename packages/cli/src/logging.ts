import chalk from 'chalk';
import { redactSecrets } from '@finverdict/tools';
import { formatDuration, type VerdictPipeline } from '@finverdict/core';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Shown only in verbose mode. */
  debug(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  write?: (line: string) => void;
}

/** Logs to stderr so stdout stays clean for answers and JSON. */
export function createLogger(options: LoggerOptions = {}): Logger {
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  return {
    info: (message) => write(chalk.cyan(`  ${redactSecrets(message)}`)),
    warn: (message) => write(chalk.yellow(`  Warning: ${redactSecrets(message)}`)),
    error: (message) => write(chalk.red(`  Error: ${redactSecrets(message)}`)),
    debug: (message) => {
      if (options.verbose) write(chalk.dim(`  ${redactSecrets(message)}`));
    },
  };
}

/** Subscribe a logger to pipeline progress events. */
export function attachPipelineLogging(pipeline: VerdictPipeline, logger: Logger): void {
  pipeline.on('stage:start', (event) => {
    logger.debug(`[${event.stageIndex + 1}/${event.totalStages}] ${event.stage}`);
  });

  pipeline.on('stage:complete', (event) => {
    logger.debug(`${chalk.bold(event.stage)} done in ${formatDuration(event.durationMs)}`);
  });

  pipeline.on('entity:resolved', (event) => {
    if (event.extractionFailure) {
      logger.warn(`Entity extraction failed: ${event.extractionFailure}`);
    }
    if (event.entity) {
      logger.debug(`Entity: ${event.entity.name} (${event.entity.symbol}) via ${event.method ?? 'directory'}`);
    } else {
      logger.debug('No entity resolved; searching market-wide');
    }
  });

  pipeline.on('provider:failed', ({ failure }) => {
    logger.debug(`${failure.provider} ${failure.operation} failed (${failure.category}): ${failure.message}`);
  });

  pipeline.on('index:ingested', ({ stats, chunks }) => {
    logger.debug(
      `Indexed ${chunks} chunks: ${stats.inserted} new, ${stats.updated} updated, ${stats.unchanged} unchanged`,
    );
    if (stats.embedFailures > 0) {
      logger.warn(`${stats.embedFailures} chunks could not be embedded and are searchable by keyword only`);
    }
  });

  pipeline.on('verification:degraded', ({ reason }) => {
    logger.warn(`Model re-check unavailable, verified by figures only: ${reason}`);
  });

  pipeline.on('verification:complete', ({ report, durationMs }) => {
    logger.debug(
      `Verification ${report.llm} in ${formatDuration(durationMs)}; ` +
        `${report.unsupportedFigures.length} unsupported figures, ${report.removedSentences.length} sentences removed`,
    );
  });

  pipeline.on('pipeline:complete', ({ result }) => {
    const { metadata } = result;
    if (metadata.providerFailures > 0) {
      logger.warn(`${metadata.providerFailures} provider calls failed: ${metadata.failedProviders.join(', ')}`);
    }
    logger.debug(`Total cost $${metadata.costUsd.toFixed(4)}, ${formatDuration(metadata.durationMs)}`);
  });

  pipeline.on('pipeline:error', ({ error, stage }) => {
    logger.debug(`Failed during ${stage ?? 'startup'}: ${error.message}`);
  });
}
