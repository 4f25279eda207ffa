export type { ToolConfig, ToolContext, ProviderId } from './types.js';
export { MissingApiKeyError, PROVIDER_IDS } from './types.js';
export { fetchWithRetry, fetchJson, HttpStatusError, ResponseShapeError, type FetchRetryConfig } from './retry.js';
export { redactSecrets } from './redact.js';
export { TtlCache } from './cache.js';

export {
  getQuote,
  getProfile,
  getKeyStatistics,
  clearCache,
  type QuoteData,
  type CompanyProfile,
  type KeyStatistics,
} from './market-data/client.js';
export { searchNews, type NewsSearchResult } from './news/client.js';
export { getCompanyNews, getMarketNews } from './news/finnhub.js';
export { getStockNews, getLatestNews } from './news/fmp.js';
export { queryTerms, matchesQuery, type NewsArticle } from './news/types.js';
export { getExchangeQuote, supportsExchangeLookup, type ExchangeQuote } from './exchange/nse.js';
export { parseExchangeSymbol, EXCHANGE_SUFFIXES, type MarketId, type ExchangeSuffix, type ParsedSymbol } from './exchange/markets.js';
export { searchWeb, buildSiteQuery, type WebSearchResult, type WebSearchOptions } from './web/search.js';
export { scrapeWithFirecrawl, fetchPage, type ScrapedPage } from './web/scrape.js';
export { extractReadableText, truncateText } from './web/extract.js';
export {
  SymbolDirectory,
  normalizeName,
  similarity,
  type SymbolEntry,
  type SymbolMatch,
  type MatchMethod,
} from './symbols/directory.js';
export {
  createSources,
  type SourceSet,
  type MarketDataSource,
  type NewsSource,
  type ExchangeSource,
  type WebSearchSource,
  type PageScraper,
  type CreateSourcesOptions,
} from './sources.js';
