/** Markets served directly by an exchange API rather than the primary market-data provider. */
export type MarketId = 'US' | 'IN';

export interface ExchangeSuffix {
  suffix: string;
  market: MarketId;
  exchange: string;
  currency: string;
}

export const EXCHANGE_SUFFIXES: readonly ExchangeSuffix[] = [
  { suffix: '.NS', market: 'IN', exchange: 'NSE', currency: 'INR' },
  { suffix: '.BO', market: 'IN', exchange: 'BSE', currency: 'INR' },
];

export interface ParsedSymbol {
  /** Symbol without the exchange suffix (`RELIANCE`). */
  base: string;
  /** Canonical upper-case symbol (`RELIANCE.NS`). */
  symbol: string;
  listing: ExchangeSuffix;
}

const SUFFIXED_SYMBOL = /^([A-Z0-9&-]{1,20})(\.[A-Z]{2})$/;

/** Parse `RELIANCE.NS`-style symbols. Returns null for unsuffixed or unknown suffixes. */
export function parseExchangeSymbol(raw: string): ParsedSymbol | null {
  const match = SUFFIXED_SYMBOL.exec(raw.trim().toUpperCase());
  if (!match) return null;
  const listing = EXCHANGE_SUFFIXES.find(s => s.suffix === match[2]);
  if (!listing) return null;
  return { base: match[1], symbol: `${match[1]}${listing.suffix}`, listing };
}
