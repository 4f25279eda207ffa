import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { resolveDataFile } from '../data.js';

const KeywordFileSchema = z.object({
  keywords: z.array(z.string()),
  phrases: z.array(z.string()),
});

export type RelevanceReason = 'keyword' | 'phrase' | 'cashtag' | 'none';

export interface RelevanceResult {
  relevant: boolean;
  reason: RelevanceReason;
  /** The keyword, phrase or cashtag that made the query relevant. */
  matched?: string;
}

/**
 * Decides whether an entity-less query is about finance at all. Queries that
 * fail get the fixed irrelevant response without any provider or model call.
 */
export class RelevanceFilter {
  private readonly keywords: Set<string>;
  private readonly phrases: string[];

  constructor(keywords: string[], phrases: string[]) {
    this.keywords = new Set(keywords.map(k => k.toLowerCase()));
    this.phrases = phrases.map(p => p.toLowerCase());
  }

  static load(path: string = resolveDataFile('finance-keywords.json')): RelevanceFilter {
    const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    const file = KeywordFileSchema.parse(raw);
    return new RelevanceFilter(file.keywords, file.phrases);
  }

  check(query: string): RelevanceResult {
    const cashtag = query.match(/\$[A-Za-z]{1,6}\b/);
    if (cashtag) return { relevant: true, reason: 'cashtag', matched: cashtag[0] };

    const lower = query.toLowerCase();
    for (const phrase of this.phrases) {
      if (lower.includes(phrase)) return { relevant: true, reason: 'phrase', matched: phrase };
    }

    for (const token of lower.split(/[^a-z0-9&/-]+/)) {
      if (token && this.keywords.has(token)) {
        return { relevant: true, reason: 'keyword', matched: token };
      }
    }

    return { relevant: false, reason: 'none' };
  }
}
