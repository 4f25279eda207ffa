import { z } from 'zod';
import { MissingApiKeyError, type ToolContext } from '../types.js';
import { fetchJson } from '../retry.js';
import type { NewsArticle } from './types.js';

const BRAVE_NEWS_URL = 'https://api.search.brave.com/res/v1/news/search';

const BraveNewsResponseSchema = z.object({
  results: z.array(z.object({
    title: z.string().optional(),
    description: z.string().optional(),
    url: z.string().optional(),
    meta_url: z.object({ hostname: z.string().optional() }).optional(),
    page_age: z.string().optional(),
  })).optional(),
});

export interface NewsSearchResult {
  articles: NewsArticle[];
  query: string;
  totalResults: number;
}

export function braveFreshness(daysBack: number): string {
  return daysBack <= 1 ? 'pd' : daysBack <= 7 ? 'pw' : 'pm';
}

/** Brave news search. Articles without a URL are dropped. */
export async function searchNews(
  query: string,
  daysBack: number,
  context: ToolContext,
): Promise<NewsSearchResult> {
  const apiKey = context.config.braveApiKey;
  if (!apiKey) {
    throw new MissingApiKeyError(
      'brave',
      'Set tools.news.api_key in ~/.finverdict/config.yaml with a Brave Search API key, or set BRAVE_API_KEY.',
    );
  }

  const params = new URLSearchParams({
    q: query,
    count: '20',
    freshness: braveFreshness(daysBack),
  });

  const data = await fetchJson(
    `${BRAVE_NEWS_URL}?${params.toString()}`,
    {
      headers: {
        'Accept': 'application/json',
        'Accept-Encoding': 'gzip',
        'X-Subscription-Token': apiKey,
      },
      signal: context.abortSignal,
    },
    BraveNewsResponseSchema,
    'Brave news',
    { maxRetries: 2, initialDelayMs: 1000 },
  );

  const articles: NewsArticle[] = [];
  for (const r of data.results ?? []) {
    if (!r.url) continue;
    articles.push({
      title: r.title ?? '',
      description: r.description ?? '',
      url: r.url,
      source: r.meta_url?.hostname ?? '',
      publishedAt: toIsoOrNull(r.page_age),
      provider: 'brave',
      symbols: [],
    });
  }

  return {
    articles,
    query,
    totalResults: articles.length,
  };
}

function toIsoOrNull(value: string | undefined): string | null {
  if (!value) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : new Date(ms).toISOString();
}
