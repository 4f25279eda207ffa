import { z } from 'zod';
import { MissingApiKeyError, type ToolContext } from '../types.js';
import { fetchJson } from '../retry.js';
import type { NewsArticle } from './types.js';

const FMP_NEWS_URL = 'https://financialmodelingprep.com/api/v3/stock_news';

const FmpNewsSchema = z.array(z.object({
  symbol: z.string().nullable().optional(),
  publishedDate: z.string().optional(),
  title: z.string().optional(),
  text: z.string().optional(),
  site: z.string().optional(),
  url: z.string().optional(),
}));

async function fetchStockNews(params: Record<string, string>, context: ToolContext): Promise<NewsArticle[]> {
  const apiKey = context.config.fmpApiKey;
  if (!apiKey) {
    throw new MissingApiKeyError('fmp', 'Set tools.fmp.api_key or FMP_API_KEY.');
  }

  const query = new URLSearchParams({ ...params, apikey: apiKey });
  const items = await fetchJson(
    `${FMP_NEWS_URL}?${query.toString()}`,
    { headers: { 'Accept': 'application/json' }, signal: context.abortSignal },
    FmpNewsSchema,
    'FMP stock news',
    { maxRetries: 1, initialDelayMs: 500 },
  );

  const articles: NewsArticle[] = [];
  for (const item of items) {
    if (!item.url || !item.title) continue;
    articles.push({
      title: item.title,
      description: item.text ?? '',
      url: item.url,
      source: item.site ?? 'FMP',
      publishedAt: parseFmpDate(item.publishedDate),
      provider: 'fmp',
      symbols: item.symbol ? [item.symbol] : [],
    });
  }
  return articles;
}

/** FMP reports `YYYY-MM-DD HH:mm:ss` in US Eastern time; treated as UTC here. */
export function parseFmpDate(value: string | undefined): string | null {
  if (!value) return null;
  const ms = Date.parse(value.includes('T') ? value : `${value.replace(' ', 'T')}Z`);
  return Number.isNaN(ms) ? null : new Date(ms).toISOString();
}

export function getStockNews(symbol: string, limit: number, context: ToolContext): Promise<NewsArticle[]> {
  return fetchStockNews({ tickers: symbol, limit: String(limit) }, context);
}

export function getLatestNews(limit: number, context: ToolContext): Promise<NewsArticle[]> {
  return fetchStockNews({ limit: String(limit) }, context);
}
