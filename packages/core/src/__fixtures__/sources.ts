import type {
  CompanyProfile,
  ExchangeQuote,
  KeyStatistics,
  NewsArticle,
  NewsSource,
  ProviderId,
  QuoteData,
  SourceSet,
} from '@finverdict/tools';

export function makeQuote(symbol: string, overrides: Partial<QuoteData> = {}): QuoteData {
  return {
    symbol,
    price: 250.5,
    previousClose: 245,
    change: 5.5,
    changePercent: 2.24,
    volume: 1000000,
    marketCap: 800000000000,
    fiftyTwoWeekHigh: 300,
    fiftyTwoWeekLow: 150,
    currency: 'USD',
    exchange: 'NasdaqGS',
    name: 'Tesla, Inc.',
    asOf: Date.UTC(2026, 9, 16, 20, 0, 0),
    stale: false,
    ...overrides,
  };
}

export function makeProfile(symbol: string, overrides: Partial<CompanyProfile> = {}): CompanyProfile {
  return {
    symbol,
    name: 'Tesla, Inc.',
    sector: 'Consumer Cyclical',
    industry: 'Auto Manufacturers',
    country: 'United States',
    website: null,
    employees: 120000,
    summary: 'Designs and sells electric vehicles.',
    stale: false,
    ...overrides,
  };
}

export function makeStats(symbol: string, overrides: Partial<KeyStatistics> = {}): KeyStatistics {
  return {
    symbol,
    trailingPE: 70.2,
    forwardPE: 60.1,
    priceToBook: null,
    trailingEps: 3.5,
    profitMargin: null,
    operatingMargin: null,
    returnOnEquity: null,
    revenueGrowth: null,
    totalRevenue: null,
    debtToEquity: null,
    dividendYield: null,
    beta: 2.1,
    recommendation: 'hold',
    stale: false,
    ...overrides,
  };
}

export function makeExchangeQuote(symbol: string, overrides: Partial<ExchangeQuote> = {}): ExchangeQuote {
  const base = symbol.split('.')[0];
  return {
    symbol,
    exchangeSymbol: base,
    exchange: 'NSE',
    companyName: 'Reliance Industries Limited',
    industry: 'Refineries',
    lastPrice: 2950.4,
    change: 12.3,
    changePercent: 0.42,
    previousClose: 2938.1,
    dayHigh: 2960,
    dayLow: 2931,
    yearHigh: 3100,
    yearLow: 2200,
    pe: 28.4,
    currency: 'INR',
    lastUpdate: '2026-10-16T10:00:00.000Z',
    url: `https://www.nseindia.com/get-quotes/equity?symbol=${base}`,
    ...overrides,
  };
}

export function makeArticle(provider: ProviderId, n: number, overrides: Partial<NewsArticle> = {}): NewsArticle {
  return {
    title: `${provider} headline ${n}`,
    description: `${provider} story ${n} about deliveries and margins`,
    url: `https://news.example.com/${provider}/${n}`,
    source: 'example.com',
    publishedAt: `2026-10-1${n % 10}T12:00:00.000Z`,
    provider,
    symbols: [],
    ...overrides,
  };
}

/** News source that serves fixed articles, or fails every call with `error`. */
export function fakeNews(
  provider: ProviderId,
  articles: NewsArticle[],
  error?: Error,
): NewsSource {
  const serve = async (): Promise<NewsArticle[]> => {
    if (error) throw error;
    return articles;
  };
  return { provider, companyNews: serve, marketNews: serve, searchNews: serve };
}

export function emptySources(overrides: Partial<SourceSet> = {}): SourceSet {
  return { news: [], scrapers: [], ...overrides };
}
