import { Command } from 'commander';
import chalk from 'chalk';
import { getConfig, type GlobalOptions } from '../context.js';
import { openStore } from '../services.js';

export function registerIndexCommand(program: Command): void {
  const index = program
    .command('index')
    .description('Inspect and maintain the evidence index');

  index
    .command('stats')
    .description('Show chunk, embedding and segment counts')
    .action(async (_options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const store = await openStore(getConfig());
      const stats = store.stats();

      if (globalOpts.json) {
        console.log(JSON.stringify({
          chunks: stats.chunks,
          embedded: stats.embedded,
          segments: stats.segments,
          dir: stats.dir,
          skipped_lines: stats.skippedLines,
        }, null, 2));
        return;
      }

      console.log(chalk.bold('Evidence index\n'));
      console.log(`  Directory:  ${stats.dir}`);
      console.log(`  Chunks:     ${stats.chunks}`);
      console.log(`  Embedded:   ${stats.embedded}`);
      console.log(`  Segments:   ${stats.segments}`);
      if (stats.skippedLines > 0) {
        console.log(chalk.yellow(`  Skipped ${stats.skippedLines} unreadable lines`));
      }
    });

  index
    .command('compact')
    .description('Rewrite all segments into one')
    .action(async (_options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const store = await openStore(getConfig());
      const { before, after } = await store.compact();

      if (globalOpts.json) {
        console.log(JSON.stringify({ segments_before: before, segments_after: after, chunks: store.size }, null, 2));
        return;
      }
      if (before === after) {
        console.log(chalk.dim(`Nothing to compact (${before} segment${before === 1 ? '' : 's'}).`));
        return;
      }
      console.log(chalk.green(`Compacted ${before} segments into ${after} (${store.size} chunks).`));
    });
}
