import { Marked } from 'marked';
import { markedTerminal } from 'marked-terminal';
import { formatMarkdown, type PipelineResult } from '@finverdict/core';

let cachedWidth = 80;
let cachedMarked: Marked | null = null;

function getMarked(width: number): Marked {
  if (cachedMarked && cachedWidth === width) return cachedMarked;
  cachedWidth = width;
  cachedMarked = new Marked();
  cachedMarked.use(
    markedTerminal({
      width,
      reflowText: false,
      showSectionPrefix: false,
      tab: 2,
    }),
  );
  return cachedMarked;
}

/** Markdown rendered for the terminal; the source text when rendering fails. */
export function renderMarkdown(content: string, width = 80): string {
  if (!content) return '';
  try {
    const rendered = getMarked(width).parse(content);
    return typeof rendered === 'string' ? rendered.replace(/\n+$/, '') : content;
  } catch (err) {
    if (!(err instanceof Error)) throw err;
    return content;
  }
}

export function renderResult(result: PipelineResult, options: { details?: boolean; width?: number } = {}): string {
  return renderMarkdown(formatMarkdown(result, { details: options.details }), options.width);
}
