import type { ProviderId, ToolConfig, ToolContext } from './types.js';
import { getQuote, getProfile, getKeyStatistics, type QuoteData, type CompanyProfile, type KeyStatistics } from './market-data/client.js';
import { searchNews } from './news/client.js';
import { getCompanyNews, getMarketNews } from './news/finnhub.js';
import { getStockNews, getLatestNews } from './news/fmp.js';
import { queryTerms, matchesQuery, type NewsArticle } from './news/types.js';
import { getExchangeQuote, supportsExchangeLookup, type ExchangeQuote } from './exchange/nse.js';
import { searchWeb, type WebSearchOptions, type WebSearchResult } from './web/search.js';
import { scrapeWithFirecrawl, fetchPage, type ScrapedPage } from './web/scrape.js';

// ---------------------------------------------------------------------------
// Source interfaces consumed by the aggregator
// ---------------------------------------------------------------------------

export interface MarketDataSource {
  readonly provider: ProviderId;
  getQuote(symbol: string, signal?: AbortSignal): Promise<QuoteData>;
  getProfile(symbol: string, signal?: AbortSignal): Promise<CompanyProfile>;
  getKeyStatistics(symbol: string, signal?: AbortSignal): Promise<KeyStatistics>;
}

export interface NewsSource {
  readonly provider: ProviderId;
  companyNews(symbol: string, companyName: string, signal?: AbortSignal): Promise<NewsArticle[]>;
  marketNews(signal?: AbortSignal): Promise<NewsArticle[]>;
  /** News matching the words of a free-text query. */
  searchNews(query: string, signal?: AbortSignal): Promise<NewsArticle[]>;
}

export interface ExchangeSource {
  readonly provider: ProviderId;
  supports(symbol: string): boolean;
  getQuote(symbol: string, signal?: AbortSignal): Promise<ExchangeQuote>;
}

export interface WebSearchSource {
  readonly provider: ProviderId;
  search(query: string, options: WebSearchOptions, signal?: AbortSignal): Promise<WebSearchResult[]>;
}

export interface PageScraper {
  readonly provider: ProviderId;
  scrape(url: string, maxChars: number, signal?: AbortSignal): Promise<ScrapedPage>;
}

export interface SourceSet {
  marketData?: MarketDataSource;
  news: NewsSource[];
  exchange?: ExchangeSource;
  webSearch?: WebSearchSource;
  /** Tried in order; later scrapers are fallbacks for earlier ones. */
  scrapers: PageScraper[];
}

export interface CreateSourcesOptions {
  /** Lookback window for company news (default: 7). */
  newsLookbackDays?: number;
  /** Size of the general feed scanned for keyword matches (default: 50). */
  feedSize?: number;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Build the source set from provider credentials. Providers without a key are
 * left out; the NSE lookup and plain page fetching need none.
 */
export function createSources(config: ToolConfig, options: CreateSourcesOptions = {}): SourceSet {
  const lookbackDays = options.newsLookbackDays ?? 7;
  const feedSize = options.feedSize ?? 50;
  const ctx = (signal?: AbortSignal): ToolContext => ({ config, abortSignal: signal });

  const news: NewsSource[] = [];

  if (config.braveApiKey) {
    news.push({
      provider: 'brave',
      companyNews: async (symbol, companyName, signal) =>
        (await searchNews(`${companyName} ${symbol} stock`, lookbackDays, ctx(signal))).articles,
      marketNews: async (signal) =>
        (await searchNews('stock market news', 1, ctx(signal))).articles,
      searchNews: async (query, signal) =>
        (await searchNews(query, lookbackDays, ctx(signal))).articles,
    });
  }

  if (config.finnhubApiKey) {
    news.push({
      provider: 'finnhub',
      companyNews: (symbol, _companyName, signal) => getCompanyNews(symbol, lookbackDays, ctx(signal)),
      marketNews: (signal) => getMarketNews(ctx(signal)),
      searchNews: async (query, signal) => {
        const terms = queryTerms(query);
        return (await getMarketNews(ctx(signal))).filter(a => matchesQuery(a, terms));
      },
    });
  }

  if (config.fmpApiKey) {
    news.push({
      provider: 'fmp',
      companyNews: (symbol, _companyName, signal) => getStockNews(symbol, 20, ctx(signal)),
      marketNews: (signal) => getLatestNews(20, ctx(signal)),
      searchNews: async (query, signal) => {
        const terms = queryTerms(query);
        return (await getLatestNews(feedSize, ctx(signal))).filter(a => matchesQuery(a, terms));
      },
    });
  }

  const scrapers: PageScraper[] = [];
  if (config.firecrawlApiKey) {
    scrapers.push({
      provider: 'firecrawl',
      scrape: (url, maxChars, signal) => scrapeWithFirecrawl(url, maxChars, ctx(signal)),
    });
  }
  scrapers.push({
    provider: 'http',
    scrape: (url, maxChars, signal) => fetchPage(url, maxChars, ctx(signal)),
  });

  return {
    marketData: config.marketDataApiKey
      ? {
          provider: 'yahoo',
          getQuote: (symbol, signal) => getQuote(symbol, ctx(signal)),
          getProfile: (symbol, signal) => getProfile(symbol, ctx(signal)),
          getKeyStatistics: (symbol, signal) => getKeyStatistics(symbol, ctx(signal)),
        }
      : undefined,
    news,
    exchange: {
      provider: 'nse',
      supports: supportsExchangeLookup,
      getQuote: (symbol, signal) => getExchangeQuote(symbol, ctx(signal)),
    },
    webSearch: config.braveApiKey
      ? {
          provider: 'brave-web',
          search: (query, searchOptions, signal) => searchWeb(query, searchOptions, ctx(signal)),
        }
      : undefined,
    scrapers,
  };
}
