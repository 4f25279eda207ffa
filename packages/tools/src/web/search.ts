import { z } from 'zod';
import { MissingApiKeyError, type ToolContext } from '../types.js';
import { fetchJson } from '../retry.js';

const BRAVE_WEB_URL = 'https://api.search.brave.com/res/v1/web/search';

const BraveWebResponseSchema = z.object({
  web: z.object({
    results: z.array(z.object({
      title: z.string().optional(),
      url: z.string().optional(),
      description: z.string().optional(),
      page_age: z.string().optional(),
    })).optional(),
  }).optional(),
});

export interface WebSearchResult {
  title: string;
  url: string;
  description: string;
  publishedAt: string | null;
}

export interface WebSearchOptions {
  /** Restrict results to these hosts via `site:` operators. */
  domains?: string[];
  count?: number;
}

export function buildSiteQuery(query: string, domains: string[] = []): string {
  if (domains.length === 0) return query;
  const sites = domains.map(d => `site:${d}`).join(' OR ');
  return `${query} (${sites})`;
}

/** Brave web search. HTML tags Brave puts in descriptions are stripped. */
export async function searchWeb(
  query: string,
  options: WebSearchOptions,
  context: ToolContext,
): Promise<WebSearchResult[]> {
  const apiKey = context.config.braveApiKey;
  if (!apiKey) {
    throw new MissingApiKeyError('brave-web', 'Set tools.news.api_key or BRAVE_API_KEY.');
  }

  const params = new URLSearchParams({
    q: buildSiteQuery(query, options.domains),
    count: String(options.count ?? 10),
  });

  const data = await fetchJson(
    `${BRAVE_WEB_URL}?${params.toString()}`,
    {
      headers: {
        'Accept': 'application/json',
        'Accept-Encoding': 'gzip',
        'X-Subscription-Token': apiKey,
      },
      signal: context.abortSignal,
    },
    BraveWebResponseSchema,
    'Brave web search',
    { maxRetries: 1, initialDelayMs: 1000 },
  );

  const results: WebSearchResult[] = [];
  for (const r of data.web?.results ?? []) {
    if (!r.url) continue;
    const ms = r.page_age ? Date.parse(r.page_age) : NaN;
    results.push({
      title: stripTags(r.title ?? ''),
      url: r.url,
      description: stripTags(r.description ?? ''),
      publishedAt: Number.isNaN(ms) ? null : new Date(ms).toISOString(),
    });
  }
  return results;
}

function stripTags(value: string): string {
  return value.replace(/<[^>]+>/g, '').trim();
}
