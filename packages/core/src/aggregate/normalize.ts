import type {
  CompanyProfile,
  ExchangeQuote,
  KeyStatistics,
  NewsArticle,
  ProviderId,
  QuoteData,
  ScrapedPage,
  WebSearchResult,
} from '@finverdict/tools';
import type { RawDocument } from '../types.js';

// One function per provider payload type. Provider shapes stop here.

const YAHOO_QUOTE_URL = 'https://finance.yahoo.com/quote';

function line(label: string, value: number | string | null | undefined, suffix = ''): string | null {
  if (value === null || value === undefined || value === '') return null;
  return `${label}: ${value}${suffix}`;
}

function lines(...entries: Array<string | null>): string {
  return entries.filter((l): l is string => l !== null).join('\n');
}

function freeze(doc: RawDocument): RawDocument {
  return Object.freeze(doc);
}

export function quoteToDocument(quote: QuoteData, provider: ProviderId): RawDocument {
  const symbol = quote.symbol.toUpperCase();
  return freeze({
    sourceId: `${provider}:quote:${symbol}`,
    url: `${YAHOO_QUOTE_URL}/${encodeURIComponent(symbol)}`,
    title: `${quote.name} (${symbol}) quote`,
    body: lines(
      line('Price', quote.price, ` ${quote.currency}`),
      line('Previous close', quote.previousClose),
      line('Change', quote.change),
      line('Change percent', quote.changePercent, '%'),
      line('Volume', quote.volume),
      line('Market cap', quote.marketCap),
      line('52-week high', quote.fiftyTwoWeekHigh),
      line('52-week low', quote.fiftyTwoWeekLow),
      line('Exchange', quote.exchange),
      quote.stale ? 'Note: cached quote, provider unavailable' : null,
    ),
    publishedAt: quote.asOf !== null ? new Date(quote.asOf).toISOString() : null,
    provider,
    kind: 'quote',
    symbol,
  });
}

export function profileToDocument(profile: CompanyProfile, provider: ProviderId): RawDocument {
  const symbol = profile.symbol.toUpperCase();
  return freeze({
    sourceId: `${provider}:profile:${symbol}`,
    url: `${YAHOO_QUOTE_URL}/${encodeURIComponent(symbol)}/profile`,
    title: `${profile.name} (${symbol}) company profile`,
    body: lines(
      line('Sector', profile.sector),
      line('Industry', profile.industry),
      line('Country', profile.country),
      line('Employees', profile.employees),
      line('Website', profile.website),
      profile.summary ? `\n${profile.summary}` : null,
    ),
    publishedAt: null,
    provider,
    kind: 'profile',
    symbol,
  });
}

export function fundamentalsToDocument(stats: KeyStatistics, provider: ProviderId): RawDocument {
  const symbol = stats.symbol.toUpperCase();
  return freeze({
    sourceId: `${provider}:fundamentals:${symbol}`,
    url: `${YAHOO_QUOTE_URL}/${encodeURIComponent(symbol)}/key-statistics`,
    title: `${symbol} key statistics`,
    body: lines(
      line('Trailing P/E', stats.trailingPE),
      line('Forward P/E', stats.forwardPE),
      line('Price to book', stats.priceToBook),
      line('Trailing EPS', stats.trailingEps),
      line('Profit margin', stats.profitMargin),
      line('Operating margin', stats.operatingMargin),
      line('Return on equity', stats.returnOnEquity),
      line('Revenue growth', stats.revenueGrowth),
      line('Total revenue', stats.totalRevenue),
      line('Debt to equity', stats.debtToEquity),
      line('Dividend yield', stats.dividendYield),
      line('Beta', stats.beta),
      line('Analyst recommendation', stats.recommendation),
    ),
    publishedAt: null,
    provider,
    kind: 'fundamentals',
    symbol,
  });
}

export function exchangeQuoteToDocument(quote: ExchangeQuote, provider: ProviderId): RawDocument {
  return freeze({
    sourceId: `${provider}:exchange:${quote.symbol}`,
    url: quote.url,
    title: `${quote.companyName} (${quote.exchangeSymbol}) ${quote.exchange} quote`,
    body: lines(
      line('Last price', quote.lastPrice, ` ${quote.currency}`),
      line('Change', quote.change),
      line('Change percent', quote.changePercent, '%'),
      line('Previous close', quote.previousClose),
      line('Day high', quote.dayHigh),
      line('Day low', quote.dayLow),
      line('52-week high', quote.yearHigh),
      line('52-week low', quote.yearLow),
      line('P/E', quote.pe),
      line('Industry', quote.industry),
    ),
    publishedAt: quote.lastUpdate,
    provider,
    kind: 'exchange',
    symbol: quote.symbol,
  });
}

export function articleToDocument(article: NewsArticle, symbol?: string): RawDocument {
  return freeze({
    sourceId: `${article.provider}:news:${article.url}`,
    url: article.url,
    title: article.title,
    body: article.source ? `${article.description}\n\nPublisher: ${article.source}` : article.description,
    publishedAt: article.publishedAt,
    provider: article.provider,
    kind: 'news',
    ...(symbol ? { symbol } : {}),
  });
}

export function webResultToDocument(result: WebSearchResult, provider: ProviderId): RawDocument {
  return freeze({
    sourceId: `${provider}:web:${result.url}`,
    url: result.url,
    title: result.title,
    body: result.description,
    publishedAt: result.publishedAt,
    provider,
    kind: 'web',
  });
}

/** Scraped page text; the search result fills in what the page lacks. */
export function scrapedPageToDocument(page: ScrapedPage, result: WebSearchResult): RawDocument {
  return freeze({
    sourceId: `${page.provider}:web:${result.url}`,
    url: result.url,
    title: page.title || result.title,
    body: page.text,
    publishedAt: page.publishedAt ?? result.publishedAt,
    provider: page.provider,
    kind: 'web',
  });
}
