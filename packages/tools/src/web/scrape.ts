import { z } from 'zod';
import { MissingApiKeyError, type ProviderId, type ToolContext } from '../types.js';
import { fetchJson, fetchWithRetry } from '../retry.js';
import { extractReadableText, truncateText } from './extract.js';

const FIRECRAWL_SCRAPE_URL = 'https://api.firecrawl.dev/v1/scrape';
const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; finverdict/0.1)';

const FirecrawlResponseSchema = z.object({
  success: z.boolean(),
  error: z.string().optional(),
  data: z.object({
    markdown: z.string().optional(),
    metadata: z.object({
      title: z.string().optional(),
      publishedTime: z.string().optional(),
    }).optional(),
  }).optional(),
});

export interface ScrapedPage {
  url: string;
  title: string;
  text: string;
  publishedAt: string | null;
  provider: ProviderId;
}

/** Scrape a page to markdown through Firecrawl. */
export async function scrapeWithFirecrawl(
  url: string,
  maxChars: number,
  context: ToolContext,
): Promise<ScrapedPage> {
  const apiKey = context.config.firecrawlApiKey;
  if (!apiKey) {
    throw new MissingApiKeyError('firecrawl', 'Set tools.firecrawl.api_key or FIRECRAWL_API_KEY.');
  }

  const body = await fetchJson(
    FIRECRAWL_SCRAPE_URL,
    {
      method: 'POST',
      headers: {
        'Authorization': `Bearer ${apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({ url, formats: ['markdown'], onlyMainContent: true }),
      signal: context.abortSignal,
    },
    FirecrawlResponseSchema,
    'Firecrawl scrape',
    { maxRetries: 0 },
  );

  const markdown = body.data?.markdown;
  if (!body.success || !markdown) {
    throw new Error(`Firecrawl could not scrape ${url}${body.error ? `: ${body.error}` : ''}`);
  }

  const published = body.data?.metadata?.publishedTime;
  const ms = published ? Date.parse(published) : NaN;
  return {
    url,
    title: body.data?.metadata?.title ?? '',
    text: truncateText(markdown.trim(), maxChars),
    publishedAt: Number.isNaN(ms) ? null : new Date(ms).toISOString(),
    provider: 'firecrawl',
  };
}

/** Plain GET plus HTML text extraction. */
export async function fetchPage(
  url: string,
  maxChars: number,
  context: ToolContext,
): Promise<ScrapedPage> {
  const response = await fetchWithRetry(
    url,
    {
      headers: {
        'Accept': 'text/html,application/xhtml+xml',
        'User-Agent': context.config.userAgent ?? DEFAULT_USER_AGENT,
      },
      redirect: 'follow',
      signal: context.abortSignal,
    },
    { maxRetries: 1, initialDelayMs: 500 },
  );

  const contentType = response.headers.get('content-type') ?? '';
  if (contentType && !contentType.includes('html') && !contentType.includes('text/plain')) {
    throw new Error(`Unsupported content type ${contentType} for ${url}`);
  }

  const html = await response.text();
  const page = contentType.includes('text/plain')
    ? { title: '', text: html.trim(), publishedAt: null }
    : extractReadableText(html);

  if (!page.text) {
    throw new Error(`No readable text at ${url}`);
  }

  return {
    url,
    title: page.title,
    text: truncateText(page.text, maxChars),
    publishedAt: page.publishedAt,
    provider: 'http',
  };
}
