import { z } from 'zod';
import type { ToolContext } from '../types.js';
import { fetchJson } from '../retry.js';
import { parseExchangeSymbol } from './markets.js';

const NSE_QUOTE_URL = 'https://www.nseindia.com/api/quote-equity';
const NSE_PAGE_URL = 'https://www.nseindia.com/get-quotes/equity';
const DEFAULT_USER_AGENT = 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

const range = z.object({ min: z.number().optional(), max: z.number().optional() }).optional();

const NseQuoteSchema = z.object({
  info: z.object({
    symbol: z.string(),
    companyName: z.string().optional(),
    industry: z.string().optional(),
  }),
  metadata: z.object({
    lastUpdateTime: z.string().optional(),
    pdSymbolPe: z.number().optional(),
  }).optional(),
  priceInfo: z.object({
    lastPrice: z.number().optional(),
    change: z.number().optional(),
    pChange: z.number().optional(),
    previousClose: z.number().optional(),
    intraDayHighLow: range,
    weekHighLow: range,
  }),
});

export interface ExchangeQuote {
  /** Requested symbol including its suffix. */
  symbol: string;
  exchangeSymbol: string;
  exchange: string;
  companyName: string;
  industry: string | null;
  lastPrice: number | null;
  change: number | null;
  changePercent: number | null;
  previousClose: number | null;
  dayHigh: number | null;
  dayLow: number | null;
  yearHigh: number | null;
  yearLow: number | null;
  pe: number | null;
  currency: string;
  lastUpdate: string | null;
  url: string;
}

export function supportsExchangeLookup(symbol: string): boolean {
  return parseExchangeSymbol(symbol)?.listing.market === 'IN';
}

/**
 * Direct quote from the NSE equity API. BSE-suffixed symbols are looked up by
 * their base symbol, which NSE shares for dual-listed companies.
 */
export async function getExchangeQuote(symbol: string, context: ToolContext): Promise<ExchangeQuote> {
  const parsed = parseExchangeSymbol(symbol);
  if (!parsed || parsed.listing.market !== 'IN') {
    throw new Error(`No direct exchange lookup for ${symbol}`);
  }

  const params = new URLSearchParams({ symbol: parsed.base });
  const data = await fetchJson(
    `${NSE_QUOTE_URL}?${params.toString()}`,
    {
      headers: {
        'Accept': 'application/json',
        'User-Agent': context.config.userAgent ?? DEFAULT_USER_AGENT,
        'Referer': 'https://www.nseindia.com/',
      },
      signal: context.abortSignal,
    },
    NseQuoteSchema,
    'NSE quote',
    { maxRetries: 1, initialDelayMs: 500 },
  );

  if (data.info.symbol.toUpperCase() !== parsed.base) {
    throw new Error(`NSE returned ${data.info.symbol} for ${parsed.base}`);
  }

  const price = data.priceInfo;
  return {
    symbol: parsed.symbol,
    exchangeSymbol: data.info.symbol,
    exchange: 'NSE',
    companyName: data.info.companyName ?? parsed.base,
    industry: data.info.industry ?? null,
    lastPrice: price.lastPrice ?? null,
    change: price.change ?? null,
    changePercent: price.pChange ?? null,
    previousClose: price.previousClose ?? null,
    dayHigh: price.intraDayHighLow?.max ?? null,
    dayLow: price.intraDayHighLow?.min ?? null,
    yearHigh: price.weekHighLow?.max ?? null,
    yearLow: price.weekHighLow?.min ?? null,
    pe: data.metadata?.pdSymbolPe ?? null,
    currency: parsed.listing.currency,
    lastUpdate: data.metadata?.lastUpdateTime ?? null,
    url: `${NSE_PAGE_URL}?${params.toString()}`,
  };
}
