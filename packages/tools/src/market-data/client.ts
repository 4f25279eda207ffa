import { z } from 'zod';
import { MissingApiKeyError, type ToolContext } from '../types.js';
import { fetchJson } from '../retry.js';
import { TtlCache } from '../cache.js';

const RAPIDAPI_HOST = 'apidojo-yahoo-finance-v1.p.rapidapi.com';
const RAPIDAPI_BASE = `https://${RAPIDAPI_HOST}`;

export interface QuoteData {
  symbol: string;
  price: number | null;
  previousClose: number | null;
  change: number | null;
  changePercent: number | null;
  volume: number | null;
  marketCap: number | null;
  fiftyTwoWeekHigh: number | null;
  fiftyTwoWeekLow: number | null;
  currency: string;
  exchange: string;
  name: string;
  /** Epoch ms of the quote, when the provider reports one. */
  asOf: number | null;
  /** True when served from an expired cache entry after a provider failure. */
  stale: boolean;
}

export interface CompanyProfile {
  symbol: string;
  name: string;
  sector: string | null;
  industry: string | null;
  country: string | null;
  website: string | null;
  employees: number | null;
  summary: string;
  stale: boolean;
}

export interface KeyStatistics {
  symbol: string;
  trailingPE: number | null;
  forwardPE: number | null;
  priceToBook: number | null;
  trailingEps: number | null;
  profitMargin: number | null;
  operatingMargin: number | null;
  returnOnEquity: number | null;
  revenueGrowth: number | null;
  totalRevenue: number | null;
  debtToEquity: number | null;
  dividendYield: number | null;
  beta: number | null;
  recommendation: string | null;
  stale: boolean;
}

const quoteCache = new TtlCache<QuoteData>();
const profileCache = new TtlCache<CompanyProfile>();
const statisticsCache = new TtlCache<KeyStatistics>();

export function clearCache(): void {
  quoteCache.clear();
  profileCache.clear();
  statisticsCache.clear();
}

const rawValue = z.object({ raw: z.number().optional() }).optional();

const QuotesResponseSchema = z.object({
  quoteResponse: z.object({
    result: z.array(z.object({
      symbol: z.string(),
      regularMarketPrice: z.number().optional(),
      regularMarketPreviousClose: z.number().optional(),
      regularMarketChange: z.number().optional(),
      regularMarketChangePercent: z.number().optional(),
      regularMarketVolume: z.number().optional(),
      regularMarketTime: z.number().optional(),
      marketCap: z.number().optional(),
      fiftyTwoWeekHigh: z.number().optional(),
      fiftyTwoWeekLow: z.number().optional(),
      currency: z.string().optional(),
      fullExchangeName: z.string().optional(),
      shortName: z.string().optional(),
      longName: z.string().optional(),
    })).optional(),
  }).optional(),
});

const ProfileResponseSchema = z.object({
  quoteType: z.object({
    symbol: z.string().optional(),
    longName: z.string().nullable().optional(),
    shortName: z.string().nullable().optional(),
  }).optional(),
  assetProfile: z.object({
    sector: z.string().optional(),
    industry: z.string().optional(),
    country: z.string().optional(),
    website: z.string().optional(),
    fullTimeEmployees: z.number().optional(),
    longBusinessSummary: z.string().optional(),
  }).optional(),
});

const StatisticsResponseSchema = z.object({
  quoteType: z.object({ symbol: z.string().optional() }).optional(),
  defaultKeyStatistics: z.object({
    forwardPE: rawValue,
    priceToBook: rawValue,
    trailingEps: rawValue,
    profitMargins: rawValue,
    beta: rawValue,
  }).optional(),
  financialData: z.object({
    totalRevenue: rawValue,
    revenueGrowth: rawValue,
    operatingMargins: rawValue,
    returnOnEquity: rawValue,
    debtToEquity: rawValue,
    recommendationKey: z.string().optional(),
  }).optional(),
  summaryDetail: z.object({
    trailingPE: rawValue,
    dividendYield: rawValue,
  }).optional(),
});

function getApiKey(context: ToolContext): string {
  const apiKey = context.config.marketDataApiKey;
  if (!apiKey) {
    throw new MissingApiKeyError(
      'yahoo',
      'Set tools.market_data.api_key in ~/.finverdict/config.yaml with a RapidAPI key, ' +
      'or set the RAPIDAPI_KEY environment variable.',
    );
  }
  return apiKey;
}

/** Yahoo keys listings by region; exchange-suffixed Indian symbols need `IN`. */
export function regionForSymbol(symbol: string): string {
  return /\.(NS|BO)$/i.test(symbol) ? 'IN' : 'US';
}

function fetchRapidAPI<T>(
  path: string,
  params: Record<string, string>,
  schema: z.ZodType<T>,
  context: ToolContext,
): Promise<T> {
  const apiKey = getApiKey(context);
  const url = `${RAPIDAPI_BASE}${path}?${new URLSearchParams(params).toString()}`;

  return fetchJson(
    url,
    {
      headers: {
        'X-RapidAPI-Key': apiKey,
        'X-RapidAPI-Host': RAPIDAPI_HOST,
      },
      signal: context.abortSignal,
    },
    schema,
    `market data ${path}`,
    { maxRetries: 2, initialDelayMs: 1000, backoffMultiplier: 2 },
  );
}

export async function getQuote(symbol: string, context: ToolContext): Promise<QuoteData> {
  const { data, stale } = await quoteCache.getOrLoad(`quote:${symbol}`, async () => {
    const response = await fetchRapidAPI(
      '/market/v2/get-quotes',
      { symbols: symbol, region: regionForSymbol(symbol) },
      QuotesResponseSchema,
      context,
    );

    const result = response.quoteResponse?.result?.[0];
    if (!result) {
      throw new Error(`No quote data found for ${symbol}`);
    }

    return {
      symbol: result.symbol,
      price: result.regularMarketPrice ?? null,
      previousClose: result.regularMarketPreviousClose ?? null,
      change: result.regularMarketChange ?? null,
      changePercent: result.regularMarketChangePercent ?? null,
      volume: result.regularMarketVolume ?? null,
      marketCap: result.marketCap ?? null,
      fiftyTwoWeekHigh: result.fiftyTwoWeekHigh ?? null,
      fiftyTwoWeekLow: result.fiftyTwoWeekLow ?? null,
      currency: result.currency ?? 'USD',
      exchange: result.fullExchangeName ?? '',
      name: result.longName ?? result.shortName ?? symbol,
      asOf: result.regularMarketTime !== undefined ? result.regularMarketTime * 1000 : null,
      stale: false,
    };
  });

  return { ...data, stale };
}

export async function getProfile(symbol: string, context: ToolContext): Promise<CompanyProfile> {
  const { data, stale } = await profileCache.getOrLoad(`profile:${symbol}`, async () => {
    const response = await fetchRapidAPI(
      '/stock/v2/get-profile',
      { symbol, region: regionForSymbol(symbol) },
      ProfileResponseSchema,
      context,
    );

    const profile = response.assetProfile;
    if (!profile) {
      throw new Error(`No profile data found for ${symbol}`);
    }

    return {
      symbol: response.quoteType?.symbol ?? symbol,
      name: response.quoteType?.longName ?? response.quoteType?.shortName ?? symbol,
      sector: profile.sector ?? null,
      industry: profile.industry ?? null,
      country: profile.country ?? null,
      website: profile.website ?? null,
      employees: profile.fullTimeEmployees ?? null,
      summary: profile.longBusinessSummary ?? '',
      stale: false,
    };
  });

  return { ...data, stale };
}

export async function getKeyStatistics(symbol: string, context: ToolContext): Promise<KeyStatistics> {
  const { data, stale } = await statisticsCache.getOrLoad(`statistics:${symbol}`, async () => {
    const response = await fetchRapidAPI(
      '/stock/v2/get-statistics',
      { symbol, region: regionForSymbol(symbol) },
      StatisticsResponseSchema,
      context,
    );

    const stats = response.defaultKeyStatistics;
    const financial = response.financialData;
    const detail = response.summaryDetail;
    if (!stats && !financial && !detail) {
      throw new Error(`No statistics found for ${symbol}`);
    }

    return {
      symbol: response.quoteType?.symbol ?? symbol,
      trailingPE: detail?.trailingPE?.raw ?? null,
      forwardPE: stats?.forwardPE?.raw ?? null,
      priceToBook: stats?.priceToBook?.raw ?? null,
      trailingEps: stats?.trailingEps?.raw ?? null,
      profitMargin: stats?.profitMargins?.raw ?? null,
      operatingMargin: financial?.operatingMargins?.raw ?? null,
      returnOnEquity: financial?.returnOnEquity?.raw ?? null,
      revenueGrowth: financial?.revenueGrowth?.raw ?? null,
      totalRevenue: financial?.totalRevenue?.raw ?? null,
      debtToEquity: financial?.debtToEquity?.raw ?? null,
      dividendYield: detail?.dividendYield?.raw ?? null,
      beta: stats?.beta?.raw ?? null,
      recommendation: financial?.recommendationKey ?? null,
      stale: false,
    };
  });

  return { ...data, stale };
}
