/**
 * Markdown rendering of a verdict: the answer, a sentiment and accuracy line,
 * then numbered sources.
 */

import type { PipelineResult } from '../pipeline/engine.js';
import { formatDuration } from './json.js';

export interface MarkdownFormatOptions {
  /** Append cost, timing and provider failures. */
  details?: boolean;
}

export function formatMarkdown(result: PipelineResult, options: MarkdownFormatOptions = {}): string {
  const { verdict, entity, metadata } = result;
  const lines: string[] = [];

  if (entity) {
    lines.push(`## ${entity.name} (${entity.symbol})`, '');
  }

  lines.push(verdict.answer, '');

  if (result.outcome === 'answered') {
    const accuracy = verdict.isAccurate ? '✓ verified against evidence' : '⚠ corrected or unverified';
    lines.push(`**Sentiment:** ${verdict.sentimentLabel} (${verdict.sentimentScore}/100)  `);
    lines.push(`**Accuracy:** ${accuracy}`);
  }

  if (verdict.sources.length > 0) {
    lines.push('', '### Sources', '');
    verdict.sources.forEach((source, i) => {
      lines.push(`${i + 1}. [${escapeLinkText(source.title)}](${source.url})`);
    });
  }

  if (options.details) {
    lines.push('', '---', '');
    lines.push('| Parameter | Value |');
    lines.push('|-----------|-------|');
    lines.push(`| Resolution | ${metadata.resolution ?? 'none'} |`);
    lines.push(`| Documents | ${metadata.documents} |`);
    lines.push(`| Evidence hits | ${metadata.hits} |`);
    lines.push(`| Provider failures | ${metadata.providerFailures} |`);
    lines.push(`| Total Cost | $${metadata.costUsd.toFixed(4)} |`);
    lines.push(`| Duration | ${formatDuration(metadata.durationMs)} |`);
  }

  return lines.join('\n').trimEnd();
}

function escapeLinkText(text: string): string {
  return text.replace(/([[\]])/g, '\\$1');
}
