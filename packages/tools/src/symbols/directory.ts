import { readFileSync, existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { parseExchangeSymbol, type MarketId } from '../exchange/markets.js';

const SymbolEntrySchema = z.object({
  symbol: z.string().min(1),
  name: z.string().min(1),
  aliases: z.array(z.string()).default([]),
  market: z.enum(['US', 'IN']),
  exchange: z.string().optional(),
});

const SymbolFileSchema = z.object({ entries: z.array(SymbolEntrySchema) });

export type SymbolEntry = z.infer<typeof SymbolEntrySchema>;

export type MatchMethod = 'suffixed' | 'cashtag' | 'ticker' | 'name' | 'fuzzy';

export interface SymbolMatch {
  entry: SymbolEntry;
  method: MatchMethod;
  /** 1 for exact matches, the similarity for fuzzy ones. */
  score: number;
}

/** Upper-case words that are also tickers but far more often mean something else. */
const AMBIGUOUS_TOKENS = new Set([
  'AI', 'IT', 'ON', 'ALL', 'NOW', 'ARE', 'CEO', 'CFO', 'IPO', 'ETF', 'GDP', 'EPS',
  'USA', 'US', 'UK', 'EU', 'FED', 'CPI', 'PE', 'ATH', 'YOY', 'QOQ', 'MA', 'EV', 'AR',
]);

/**
 * One-word company names that are ordinary words more often than not. They
 * only count as a name match when the text also talks about markets.
 */
const AMBIGUOUS_NAMES = new Set([
  'visa', 'oracle', 'meta', 'ford', 'lucid', 'snowflake', 'caterpillar', 'coke',
]);

const MARKET_CONTEXT = new Set([
  'stock', 'stocks', 'share', 'shares', 'shareholders', 'price', 'prices', 'market', 'cap',
  'earnings', 'revenue', 'profit', 'sales', 'quarter', 'quarterly', 'guidance', 'results',
  'dividend', 'valuation', 'investors', 'analyst', 'analysts', 'ticker', 'trading', 'traded',
  'rally', 'rallied', 'rose', 'fell', 'gained', 'dropped', 'buy', 'sell', 'bullish', 'bearish',
  'nyse', 'nasdaq', 'inc', 'corp', 'corporation', 'company',
]);

const FUZZY_THRESHOLD = 0.8;
const FUZZY_MIN_LENGTH = 5;

function resolveDataPath(): string {
  const thisDir = dirname(fileURLToPath(import.meta.url));
  // src/symbols -> packages/tools/data
  const srcPath = resolve(thisDir, '..', '..', 'data', 'symbols.json');
  if (existsSync(srcPath)) return srcPath;
  // dist/tools/src/symbols -> packages/tools/data
  return resolve(thisDir, '..', '..', '..', '..', 'packages', 'tools', 'data', 'symbols.json');
}

/** Lower-case, possessives dropped, punctuation to spaces. */
export function normalizeName(text: string): string {
  return text
    .toLowerCase()
    .replace(/['’]s\b/g, '')
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

/** 1 − edit distance / longer length. */
export function similarity(a: string, b: string): number {
  if (a === b) return 1;
  const longer = Math.max(a.length, b.length);
  if (longer === 0) return 1;
  return 1 - levenshtein(a, b) / longer;
}

function levenshtein(a: string, b: string): number {
  let prev = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const curr = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr.push(Math.min(prev[j] + 1, curr[j - 1] + 1, prev[j - 1] + cost));
    }
    prev = curr;
  }
  return prev[b.length];
}

/**
 * Known tradable symbols with their company names and aliases.
 * Matching is deterministic and tried strongest-first.
 */
export class SymbolDirectory {
  private readonly entries: SymbolEntry[];
  private readonly bySymbol = new Map<string, SymbolEntry>();
  private readonly phrases: Array<{ phrase: string; entry: SymbolEntry }> = [];
  private readonly singleWords: Array<{ word: string; entry: SymbolEntry }> = [];

  constructor(entries: SymbolEntry[]) {
    this.entries = entries;
    for (const entry of entries) {
      const symbol = entry.symbol.toUpperCase();
      this.bySymbol.set(symbol, entry);
      const parsed = parseExchangeSymbol(symbol);
      if (parsed && !this.bySymbol.has(parsed.base)) {
        this.bySymbol.set(parsed.base, entry);
      }

      for (const name of [entry.name, ...entry.aliases]) {
        const phrase = normalizeName(name);
        if (!phrase) continue;
        this.phrases.push({ phrase, entry });
        if (!phrase.includes(' ') && phrase.length >= FUZZY_MIN_LENGTH) {
          this.singleWords.push({ word: phrase, entry });
        }
      }
    }
    // Longest phrase first so "bank of america" beats "america"-like fragments.
    this.phrases.sort((a, b) => b.phrase.length - a.phrase.length);
  }

  static load(path: string = resolveDataPath()): SymbolDirectory {
    const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    return new SymbolDirectory(SymbolFileSchema.parse(raw).entries);
  }

  get size(): number {
    return this.entries.length;
  }

  lookupSymbol(symbol: string): SymbolEntry | undefined {
    return this.bySymbol.get(symbol.toUpperCase());
  }

  match(text: string): SymbolMatch | null {
    return this.matchSuffixed(text) ??
      this.matchCashtag(text) ??
      this.matchTickerToken(text) ??
      this.matchPhrase(text) ??
      this.matchFuzzy(text);
  }

  private matchSuffixed(text: string): SymbolMatch | null {
    for (const candidate of text.match(/\b[A-Za-z0-9&-]{1,20}\.(?:NS|BO|ns|bo)\b/g) ?? []) {
      const parsed = parseExchangeSymbol(candidate);
      if (!parsed) continue;
      const exact = this.bySymbol.get(parsed.symbol);
      if (exact && exact.symbol.toUpperCase() === parsed.symbol) {
        return { entry: exact, method: 'suffixed', score: 1 };
      }
      // Same company on the sibling exchange (TCS.BO -> TCS.NS) lends its name.
      const sibling = this.bySymbol.get(parsed.base);
      const name = sibling && sibling.market === parsed.listing.market ? sibling.name : parsed.base;
      return {
        entry: { symbol: parsed.symbol, name, aliases: [], market: parsed.listing.market, exchange: parsed.listing.exchange },
        method: 'suffixed',
        score: 1,
      };
    }
    return null;
  }

  private matchCashtag(text: string): SymbolMatch | null {
    for (const m of text.matchAll(/\$([A-Za-z][A-Za-z.-]{0,9})\b/g)) {
      const entry = this.bySymbol.get(m[1].replace(/[.-]+$/, '').toUpperCase());
      if (entry) return { entry, method: 'cashtag', score: 1 };
    }
    return null;
  }

  private matchTickerToken(text: string): SymbolMatch | null {
    for (const m of text.matchAll(/\b[A-Z]{2,5}(?:-[A-Z])?\b/g)) {
      const token = m[0];
      if (AMBIGUOUS_TOKENS.has(token)) continue;
      const entry = this.bySymbol.get(token);
      if (entry) return { entry, method: 'ticker', score: 1 };
    }
    return null;
  }

  private matchPhrase(text: string): SymbolMatch | null {
    const normalized = normalizeName(text);
    const haystack = ` ${normalized} `;
    const marketContext = hasMarketContext(normalized);
    for (const { phrase, entry } of this.phrases) {
      if (!marketContext && AMBIGUOUS_NAMES.has(phrase)) continue;
      if (haystack.includes(` ${phrase} `)) {
        return { entry, method: 'name', score: 1 };
      }
    }
    return null;
  }

  private matchFuzzy(text: string): SymbolMatch | null {
    let best: SymbolMatch | null = null;
    const normalized = normalizeName(text);
    const marketContext = hasMarketContext(normalized);
    for (const word of normalized.split(' ')) {
      if (word.length < FUZZY_MIN_LENGTH - 1) continue;
      for (const candidate of this.singleWords) {
        if (candidate.word[0] !== word[0]) continue;
        if (!marketContext && AMBIGUOUS_NAMES.has(candidate.word)) continue;
        const score = similarity(word, candidate.word);
        if (score >= FUZZY_THRESHOLD && (!best || score > best.score)) {
          best = { entry: candidate.entry, method: 'fuzzy', score };
        }
      }
    }
    return best;
  }
}

function hasMarketContext(normalized: string): boolean {
  return normalized.split(' ').some(word => MARKET_CONTEXT.has(word));
}
