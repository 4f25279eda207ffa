import * as cheerio from 'cheerio';

const BOILERPLATE_SELECTORS = [
  'script',
  'style',
  'noscript',
  'svg',
  'iframe',
  'nav',
  'header',
  'footer',
  'aside',
  'form',
  '.nav',
  '.navigation',
  '.sidebar',
  '.menu',
  '.advert',
  '.ad',
  '.cookie-banner',
  '.newsletter',
  '[role="navigation"]',
  '[role="banner"]',
  '[role="contentinfo"]',
];

export interface ExtractedPage {
  title: string;
  text: string;
  publishedAt: string | null;
}

/**
 * Readable text of an HTML page: boilerplate removed, main content preferred
 * (article, then main, then body), whitespace collapsed.
 */
export function extractReadableText(html: string): ExtractedPage {
  const $ = cheerio.load(html);

  const title = $('meta[property="og:title"]').attr('content')?.trim() ||
    $('title').first().text().trim() ||
    $('h1').first().text().trim();

  const published = $('meta[property="article:published_time"]').attr('content') ??
    $('time[datetime]').first().attr('datetime');

  for (const selector of BOILERPLATE_SELECTORS) {
    $(selector).remove();
  }

  let content = $('article').first();
  if (content.length === 0) content = $('main').first();
  if (content.length === 0) content = $('body');

  const blocks: string[] = [];
  content.find('h1, h2, h3, h4, p, li, td, blockquote').each((_, el) => {
    const text = $(el).text().replace(/\s+/g, ' ').trim();
    if (text.length > 0) blocks.push(text);
  });

  const text = blocks.length > 0
    ? blocks.join('\n')
    : content.text().replace(/\s+/g, ' ').trim();

  return { title, text, publishedAt: toIsoOrNull(published) };
}

/** Cut text to `maxChars`, preferring the last sentence or line break inside the budget. */
export function truncateText(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  const slice = text.slice(0, maxChars);
  const boundary = Math.max(slice.lastIndexOf('. '), slice.lastIndexOf('\n'));
  return boundary > maxChars * 0.6 ? slice.slice(0, boundary + 1).trimEnd() : slice.trimEnd();
}

function toIsoOrNull(value: string | undefined): string | null {
  if (!value) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : new Date(ms).toISOString();
}
