import { z } from 'zod';
import { MissingApiKeyError, type ToolContext } from '../types.js';
import { fetchJson } from '../retry.js';
import { isoDaysAgo, type NewsArticle } from './types.js';

const FINNHUB_BASE = 'https://finnhub.io/api/v1';

const FinnhubNewsSchema = z.array(z.object({
  headline: z.string().optional(),
  summary: z.string().optional(),
  url: z.string().optional(),
  source: z.string().optional(),
  datetime: z.number().optional(),
  related: z.string().optional(),
}));

function getToken(context: ToolContext): string {
  const token = context.config.finnhubApiKey;
  if (!token) {
    throw new MissingApiKeyError('finnhub', 'Set tools.finnhub.api_key or FINNHUB_API_KEY.');
  }
  return token;
}

async function fetchFinnhub(path: string, params: Record<string, string>, context: ToolContext): Promise<NewsArticle[]> {
  const query = new URLSearchParams({ ...params, token: getToken(context) });
  const items = await fetchJson(
    `${FINNHUB_BASE}${path}?${query.toString()}`,
    { headers: { 'Accept': 'application/json' }, signal: context.abortSignal },
    FinnhubNewsSchema,
    `Finnhub ${path}`,
    { maxRetries: 1, initialDelayMs: 500 },
  );

  const articles: NewsArticle[] = [];
  for (const item of items) {
    if (!item.url || !item.headline) continue;
    articles.push({
      title: item.headline,
      description: item.summary ?? '',
      url: item.url,
      source: item.source ?? 'Finnhub',
      publishedAt: item.datetime ? new Date(item.datetime * 1000).toISOString() : null,
      provider: 'finnhub',
      symbols: item.related ? item.related.split(',').map(s => s.trim()).filter(Boolean) : [],
    });
  }
  return articles;
}

/** Company news for a US-listed symbol over the last `daysBack` days. */
export function getCompanyNews(
  symbol: string,
  daysBack: number,
  context: ToolContext,
  now: Date = new Date(),
): Promise<NewsArticle[]> {
  return fetchFinnhub('/company-news', {
    symbol,
    from: isoDaysAgo(daysBack, now),
    to: isoDaysAgo(0, now),
  }, context);
}

export function getMarketNews(context: ToolContext): Promise<NewsArticle[]> {
  return fetchFinnhub('/news', { category: 'general' }, context);
}
