import type { ProviderId } from '../types.js';

export interface NewsArticle {
  title: string;
  description: string;
  url: string;
  /** Publisher host or name as reported by the provider. */
  source: string;
  /** ISO-8601 timestamp, or null when the provider gives only a relative age. */
  publishedAt: string | null;
  provider: ProviderId;
  /** Tickers the provider associates with the article. */
  symbols: string[];
}

const STOP_WORDS = new Set([
  'the', 'and', 'for', 'are', 'was', 'were', 'has', 'have', 'had', 'does', 'did',
  'will', 'would', 'could', 'should', 'can', 'what', 'which', 'who', 'whom', 'how',
  'why', 'when', 'where', 'with', 'from', 'into', 'about', 'this', 'that', 'these',
  'those', 'its', 'their', 'our', 'your', 'any', 'all', 'now', 'right', 'today',
  'going', 'is', 'be', 'to', 'of', 'in', 'on', 'at', 'by', 'or', 'not', 'a', 'an',
]);

/** Significant lower-case terms of a free-text query. */
export function queryTerms(query: string): string[] {
  const words = query
    .toLowerCase()
    .replace(/[^a-z0-9\s.$-]/g, ' ')
    .split(/\s+/)
    .map(w => w.replace(/^[$.-]+|[.-]+$/g, ''))
    .filter(w => w.length > 2 && !STOP_WORDS.has(w));
  return [...new Set(words)];
}

/**
 * Keyword match for providers that only offer a general feed.
 * At least 40% of the query terms (minimum 1) must occur in title or description.
 */
export function matchesQuery(article: NewsArticle, terms: string[]): boolean {
  if (terms.length === 0) return false;
  const text = `${article.title} ${article.description}`.toLowerCase();
  const hits = terms.filter(t => text.includes(t)).length;
  return hits >= Math.max(1, Math.ceil(terms.length * 0.4));
}

export function isoDaysAgo(days: number, now: Date = new Date()): string {
  const d = new Date(now.getTime() - days * 24 * 60 * 60 * 1000);
  return d.toISOString().slice(0, 10);
}
