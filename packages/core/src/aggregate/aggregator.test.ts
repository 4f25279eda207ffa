import { describe, it, expect, vi } from 'vitest';
import type { PageScraper } from '@finverdict/tools';
import { SourceAggregator, dedupe, toFailure } from './aggregator.js';
import { RelevanceFilter } from '../resolve/relevance.js';
import type { Entity, RawDocument } from '../types.js';
import {
  emptySources,
  fakeNews,
  makeArticle,
  makeExchangeQuote,
  makeProfile,
  makeQuote,
  makeStats,
} from '../__fixtures__/sources.js';

const relevance = RelevanceFilter.load();

const tesla: Entity = { symbol: 'TSLA', name: 'Tesla, Inc.', market: 'US', baseSymbol: 'TSLA' };
const reliance: Entity = {
  symbol: 'RELIANCE.NS',
  name: 'Reliance Industries Limited',
  market: 'IN',
  exchange: 'NSE',
  baseSymbol: 'RELIANCE',
};

function marketData(symbolOverride?: string) {
  return {
    provider: 'yahoo' as const,
    getQuote: vi.fn(async (symbol: string) => makeQuote(symbolOverride ?? symbol)),
    getProfile: vi.fn(async (symbol: string) => makeProfile(symbol)),
    getKeyStatistics: vi.fn(async (symbol: string) => makeStats(symbol)),
  };
}

describe('SourceAggregator', () => {
  it('returns irrelevant for off-topic queries without calling providers', async () => {
    const news = fakeNews('finnhub', [makeArticle('finnhub', 1)]);
    const spy = vi.spyOn(news, 'marketNews');
    const aggregator = new SourceAggregator(emptySources({ news: [news] }), relevance);

    expect(await aggregator.fetch("What's the capital of France?", null)).toEqual({ status: 'irrelevant' });
    expect(spy).not.toHaveBeenCalled();
  });

  it('gathers quote, profile, fundamentals and company news for an entity', async () => {
    const sources = emptySources({
      marketData: marketData(),
      news: [fakeNews('finnhub', [makeArticle('finnhub', 1, { symbols: ['TSLA'] })])],
    });
    const aggregator = new SourceAggregator(sources, relevance);

    const outcome = await aggregator.fetch('Is Tesla up?', tesla);

    expect(outcome.status).toBe('ok');
    if (outcome.status !== 'ok') return;
    expect(outcome.documents.map(d => d.kind)).toEqual(['quote', 'profile', 'fundamentals', 'news']);
    expect(outcome.documents[3].symbol).toBe('TSLA');
    expect(outcome.facts.quote?.price).toBe(250.5);
    expect(outcome.facts.fundamentals?.trailingPE).toBe(70.2);
    expect(outcome.failures).toEqual([]);
  });

  it('drops payloads about a different symbol', async () => {
    const sources = emptySources({
      marketData: marketData('TSLQ'),
      news: [
        fakeNews('fmp', [
          makeArticle('fmp', 1, { symbols: ['F'] }),
          makeArticle('fmp', 2, { symbols: ['TSLA', 'F'] }),
        ]),
      ],
    });
    const aggregator = new SourceAggregator(sources, relevance);

    const outcome = await aggregator.fetch('Is Tesla up?', tesla);

    if (outcome.status !== 'ok') throw new Error('expected ok');
    expect(outcome.facts.quote).toBeUndefined();
    expect(outcome.documents.every(d => d.symbol === undefined || d.symbol === 'TSLA')).toBe(true);
    expect(outcome.documents.filter(d => d.kind === 'news').map(d => d.url)).toEqual([
      'https://news.example.com/fmp/2',
    ]);
    expect(outcome.failures).toEqual([
      { provider: 'yahoo', operation: 'quote', category: 'unknown', message: 'yahoo quote failed: returned TSLQ for TSLA' },
    ]);
  });

  it('fetches the exchange directly for suffixed symbols', async () => {
    const exchange = {
      provider: 'nse' as const,
      supports: (symbol: string) => symbol.endsWith('.NS'),
      getQuote: vi.fn(async (symbol: string) => makeExchangeQuote(symbol)),
    };
    const aggregator = new SourceAggregator(emptySources({ exchange }), relevance);

    const outcome = await aggregator.fetch('How is RELIANCE.NS doing?', reliance);

    if (outcome.status !== 'ok') throw new Error('expected ok');
    expect(exchange.getQuote).toHaveBeenCalledWith('RELIANCE.NS', expect.any(AbortSignal));
    expect(outcome.documents).toHaveLength(1);
    expect(outcome.documents[0].provider).toBe('nse');
    expect(outcome.documents[0].url).toBe('https://www.nseindia.com/get-quotes/equity?symbol=RELIANCE');
    expect(outcome.facts.exchangeQuote?.lastPrice).toBe(2950.4);
  });

  it('keeps going when some news providers fail', async () => {
    const sources = emptySources({
      news: [
        fakeNews('brave', [], new Error('HTTP 503 Service Unavailable for https://api.example.com/news?apikey=test-secret')),
        fakeNews('finnhub', [], new Error('HTTP 429 Too Many Requests (rate limited) for https://finnhub.example.com')),
        fakeNews('fmp', [makeArticle('fmp', 1)]),
      ],
    });
    const aggregator = new SourceAggregator(sources, relevance);

    const outcome = await aggregator.fetch('Tesla deliveries', tesla);

    if (outcome.status !== 'ok') throw new Error('expected ok');
    expect(outcome.documents.map(d => d.url)).toEqual(['https://news.example.com/fmp/1']);
    expect(outcome.failures.map(f => [f.provider, f.operation, f.category])).toEqual([
      ['brave', 'companyNews', 'server_error'],
      ['finnhub', 'companyNews', 'rate_limit'],
    ]);
    expect(outcome.failures[0].message).toBe(
      'HTTP 503 Service Unavailable for https://api.example.com/news?apikey=***',
    );
  });

  it('uses market and keyword news for relevant entity-less queries', async () => {
    const news = fakeNews('finnhub', [makeArticle('finnhub', 1)]);
    const market = vi.spyOn(news, 'marketNews');
    const search = vi.spyOn(news, 'searchNews');
    const aggregator = new SourceAggregator(emptySources({ news: [news] }), relevance);

    const outcome = await aggregator.fetch('Will the Fed cut interest rates?', null);

    expect(market).toHaveBeenCalledTimes(1);
    expect(search).toHaveBeenCalledWith('Will the Fed cut interest rates?', expect.any(AbortSignal));
    // Same article from both feeds collapses to one document
    if (outcome.status !== 'ok') throw new Error('expected ok');
    expect(outcome.documents).toHaveLength(1);
  });

  describe('web augmentation', () => {
    const results = [1, 2, 3, 4].map(n => ({
      title: `Result ${n}`,
      url: `https://www.reuters.com/markets/${n}`,
      description: `Snippet ${n}`,
      publishedAt: null,
    }));

    function webSearch() {
      return { provider: 'brave-web' as const, search: vi.fn(async () => results) };
    }

    it('restricts search to the context domains and deep-fetches the top results', async () => {
      const search = webSearch();
      const scraper: PageScraper = {
        provider: 'http',
        scrape: vi.fn(async (url: string) => ({
          url,
          title: '',
          text: `Full text of ${url}`,
          publishedAt: null,
          provider: 'http' as const,
        })),
      };
      const aggregator = new SourceAggregator(
        emptySources({ webSearch: search, scrapers: [scraper] }),
        relevance,
        { deepFetchCount: 3, deepFetchChars: 1000 },
      );

      const outcome = await aggregator.fetch('Is Tesla up?', tesla);

      expect(search.search).toHaveBeenCalledWith(
        'Is Tesla up?',
        { domains: ['reuters.com', 'cnbc.com', 'marketwatch.com', 'finance.yahoo.com', 'bloomberg.com'], count: 5 },
        expect.any(AbortSignal),
      );
      expect(scraper.scrape).toHaveBeenCalledTimes(3);
      expect(scraper.scrape).toHaveBeenCalledWith('https://www.reuters.com/markets/1', 1000, expect.any(AbortSignal));
      if (outcome.status !== 'ok') throw new Error('expected ok');
      expect(outcome.documents.map(d => [d.title, d.body, d.provider])).toEqual([
        ['Result 1', 'Full text of https://www.reuters.com/markets/1', 'http'],
        ['Result 2', 'Full text of https://www.reuters.com/markets/2', 'http'],
        ['Result 3', 'Full text of https://www.reuters.com/markets/3', 'http'],
        ['Result 4', 'Snippet 4', 'brave-web'],
      ]);
    });

    it('falls back to the next scraper, then to the snippet', async () => {
      const firecrawl: PageScraper = {
        provider: 'firecrawl',
        scrape: vi.fn(async () => {
          throw new Error('HTTP 402 Payment Required for https://api.firecrawl.dev/v1/scrape');
        }),
      };
      const http: PageScraper = {
        provider: 'http',
        scrape: vi.fn(async (url: string) => {
          if (url.endsWith('/1')) {
            return { url, title: 'Page 1', text: 'Fetched page 1', publishedAt: null, provider: 'http' as const };
          }
          throw new Error(`HTTP 403 Forbidden for ${url}`);
        }),
      };
      const aggregator = new SourceAggregator(
        emptySources({ webSearch: webSearch(), scrapers: [firecrawl, http] }),
        relevance,
        { deepFetchCount: 2 },
      );

      const outcome = await aggregator.fetch('Is Tesla up?', tesla);

      if (outcome.status !== 'ok') throw new Error('expected ok');
      expect(outcome.documents.map(d => [d.title, d.body])).toEqual([
        ['Page 1', 'Fetched page 1'],
        ['Result 2', 'Snippet 2'],
        ['Result 3', 'Snippet 3'],
        ['Result 4', 'Snippet 4'],
      ]);
      expect(outcome.failures.map(f => `${f.provider}:${f.category}`)).toEqual([
        'firecrawl:unknown',
        'firecrawl:unknown',
        'http:auth_error',
      ]);
    });
  });
});

describe('dedupe', () => {
  const doc = (url: string, title: string): RawDocument => ({
    sourceId: url,
    url,
    title,
    body: '',
    publishedAt: null,
    provider: 'brave',
    kind: 'news',
  });

  it('keeps the first document per url and title', () => {
    const docs = [doc('https://a.example', 'A'), doc('https://a.example', ' a '), doc('https://a.example', 'B')];
    expect(dedupe(docs).map(d => d.title)).toEqual(['A', 'B']);
  });
});

describe('toFailure', () => {
  it('redacts credentials and classifies the error', () => {
    expect(toFailure('finnhub', 'marketNews', new Error('HTTP 401 Unauthorized for https://x.example/news?token=test-secret'))).toEqual({
      provider: 'finnhub',
      operation: 'marketNews',
      category: 'auth_error',
      message: 'HTTP 401 Unauthorized for https://x.example/news?token=***',
    });
  });
});
