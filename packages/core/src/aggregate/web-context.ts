import type { Entity } from '../types.js';

export type WebContext = 'crypto' | 'secondary-market' | 'global';

/** Hosts a context's web search is restricted to. */
export const CONTEXT_DOMAINS: Record<WebContext, readonly string[]> = {
  crypto: ['coindesk.com', 'cointelegraph.com', 'theblock.co', 'decrypt.co'],
  'secondary-market': [
    'moneycontrol.com',
    'economictimes.indiatimes.com',
    'livemint.com',
    'business-standard.com',
    'nseindia.com',
  ],
  global: ['reuters.com', 'cnbc.com', 'marketwatch.com', 'finance.yahoo.com', 'bloomberg.com'],
};

const CRYPTO_TERMS = /\b(crypto|cryptocurrenc(?:y|ies)|bitcoin|btc|ethereum|eth|solana|stablecoins?|altcoins?|defi|blockchain)\b/i;
const SECONDARY_MARKET_TERMS = /\b(nifty|sensex|nse|bse|india|indian|rupee|sebi)\b/i;

export function classifyWebContext(query: string, entity: Entity | null): WebContext {
  if (CRYPTO_TERMS.test(query)) return 'crypto';
  if ((entity && entity.market !== 'US') || SECONDARY_MARKET_TERMS.test(query)) return 'secondary-market';
  return 'global';
}

/** Text sent to web search: the query, led by the company name when it is not already there. */
export function webSearchQuery(query: string, entity: Entity | null): string {
  if (!entity) return query;
  const lower = query.toLowerCase();
  const shortName = entity.name.replace(/,?\s+(inc\.?|limited|ltd\.?|corporation|corp\.?|plc)$/i, '');
  if (lower.includes(shortName.toLowerCase()) || lower.includes(entity.baseSymbol.toLowerCase())) {
    return query;
  }
  return `${shortName} ${query}`;
}
