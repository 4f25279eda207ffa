import {
  redactSecrets,
  type NewsArticle,
  type ProviderId,
  type SourceSet,
  type WebSearchResult,
  type WebSearchSource,
} from '@finverdict/tools';
import { fanOut, type FanOutTask } from '../pipeline/fanout.js';
import { classifyError } from '../router/retry.js';
import { ProviderUnavailableError } from '../errors.js';
import type { RelevanceFilter } from '../resolve/relevance.js';
import type { AggregationOutcome, Entity, FactBundle, ProviderFailure, RawDocument } from '../types.js';
import {
  articleToDocument,
  exchangeQuoteToDocument,
  fundamentalsToDocument,
  profileToDocument,
  quoteToDocument,
  scrapedPageToDocument,
  webResultToDocument,
} from './normalize.js';
import { CONTEXT_DOMAINS, classifyWebContext, webSearchQuery } from './web-context.js';

export interface AggregatorOptions {
  /** Concurrent provider calls (default: 6). */
  concurrency?: number;
  /** Per-call timeout in milliseconds (default: 8000). */
  timeoutMs?: number;
  /** Overall deadline for the whole fetch in milliseconds (default: 20000). */
  deadlineMs?: number;
  /** Web results fetched in full (default: 3). */
  deepFetchCount?: number;
  /** Character budget per fetched page (default: 4000). */
  deepFetchChars?: number;
  /** Web results requested from search (default: 5). */
  webResultCount?: number;
}

/** What one provider task contributes. */
interface TaskYield {
  documents: RawDocument[];
  facts?: FactBundle;
  webResults?: WebSearchResult[];
}

interface ProviderTask extends FanOutTask<TaskYield> {
  provider: ProviderId;
  operation: string;
}

const DEFAULTS: Required<AggregatorOptions> = {
  concurrency: 6,
  timeoutMs: 8000,
  deadlineMs: 20000,
  deepFetchCount: 3,
  deepFetchChars: 4000,
  webResultCount: 5,
};

/**
 * Fetches evidence for one query from every configured provider. Provider
 * failures never fail the fetch; they come back as redacted records.
 */
export class SourceAggregator {
  private readonly options: Required<AggregatorOptions>;

  constructor(
    private readonly sources: SourceSet,
    private readonly relevance: RelevanceFilter,
    options: AggregatorOptions = {},
  ) {
    this.options = { ...DEFAULTS, ...options };
  }

  async fetch(query: string, entity: Entity | null, signal?: AbortSignal): Promise<AggregationOutcome> {
    if (!entity && !this.relevance.check(query).relevant) {
      return { status: 'irrelevant' };
    }

    const started = Date.now();
    const { webSearch } = this.sources;
    const tasks = entity ? this.entityTasks(entity) : this.marketTasks(query);
    if (webSearch) {
      tasks.push(this.webSearchTask(webSearch, query, entity));
    }

    const failures: ProviderFailure[] = [];
    const facts: FactBundle = {};
    const documents: RawDocument[] = [];
    const webResults: WebSearchResult[] = [];

    const outcomes = await fanOut(tasks, this.fanOutOptions(this.options.deadlineMs, signal));
    outcomes.forEach((outcome, i) => {
      const task = tasks[i];
      if (outcome.status === 'rejected') {
        failures.push(toFailure(task.provider, task.operation, outcome.error));
        return;
      }
      documents.push(...outcome.value.documents);
      Object.assign(facts, outcome.value.facts);
      webResults.push(...(outcome.value.webResults ?? []));
    });

    const remainingMs = this.options.deadlineMs - (Date.now() - started);
    if (webSearch) {
      documents.push(...(await this.deepFetch(webSearch.provider, webResults, remainingMs, failures, signal)));
    }

    return { status: 'ok', documents: dedupe(documents), facts, failures };
  }

  // -------------------------------------------------------------------------
  // Task builders
  // -------------------------------------------------------------------------

  private entityTasks(entity: Entity): ProviderTask[] {
    const tasks: ProviderTask[] = [];
    const { marketData, exchange } = this.sources;

    if (marketData) {
      const provider = marketData.provider;
      tasks.push(
        this.task(provider, 'quote', async (signal) => {
          const quote = await marketData.getQuote(entity.symbol, signal);
          assertSymbol(provider, 'quote', quote.symbol, entity);
          return { documents: [quoteToDocument(quote, provider)], facts: { quote } };
        }),
        this.task(provider, 'profile', async (signal) => {
          const profile = await marketData.getProfile(entity.symbol, signal);
          assertSymbol(provider, 'profile', profile.symbol, entity);
          return { documents: [profileToDocument(profile, provider)], facts: { profile } };
        }),
        this.task(provider, 'fundamentals', async (signal) => {
          const fundamentals = await marketData.getKeyStatistics(entity.symbol, signal);
          assertSymbol(provider, 'fundamentals', fundamentals.symbol, entity);
          return { documents: [fundamentalsToDocument(fundamentals, provider)], facts: { fundamentals } };
        }),
      );
    }

    for (const news of this.sources.news) {
      tasks.push(this.task(news.provider, 'companyNews', async (signal) => {
        const articles = await news.companyNews(entity.symbol, entity.name, signal);
        return {
          documents: articles
            .filter(a => isAbout(a, entity))
            .map(a => articleToDocument(a, entity.symbol)),
        };
      }));
    }

    if (exchange && exchange.supports(entity.symbol)) {
      tasks.push(this.task(exchange.provider, 'exchangeQuote', async (signal) => {
        const exchangeQuote = await exchange.getQuote(entity.symbol, signal);
        assertSymbol(exchange.provider, 'exchangeQuote', exchangeQuote.symbol, entity);
        return { documents: [exchangeQuoteToDocument(exchangeQuote, exchange.provider)], facts: { exchangeQuote } };
      }));
    }

    return tasks;
  }

  private marketTasks(query: string): ProviderTask[] {
    const tasks: ProviderTask[] = [];
    for (const news of this.sources.news) {
      tasks.push(
        this.task(news.provider, 'marketNews', async (signal) => ({
          documents: (await news.marketNews(signal)).map(a => articleToDocument(a)),
        })),
        this.task(news.provider, 'searchNews', async (signal) => ({
          documents: (await news.searchNews(query, signal)).map(a => articleToDocument(a)),
        })),
      );
    }
    return tasks;
  }

  private webSearchTask(webSearch: WebSearchSource, query: string, entity: Entity | null): ProviderTask {
    return this.task(webSearch.provider, 'webSearch', async (signal) => {
      const context = classifyWebContext(query, entity);
      const results = await webSearch.search(
        webSearchQuery(query, entity),
        { domains: [...CONTEXT_DOMAINS[context]], count: this.options.webResultCount },
        signal,
      );
      return { documents: [], webResults: results };
    });
  }

  private task(
    provider: ProviderId,
    operation: string,
    run: (signal: AbortSignal) => Promise<TaskYield>,
  ): ProviderTask {
    return { name: `${provider}:${operation}`, provider, operation, run };
  }

  // -------------------------------------------------------------------------
  // Deep fetch
  // -------------------------------------------------------------------------

  /**
   * Fetch the top web results in full. Each page tries the scrapers in order;
   * when all of them fail, or the deadline leaves no time, the search snippet
   * stands in for the page.
   */
  private async deepFetch(
    searchProvider: ProviderId,
    results: WebSearchResult[],
    remainingMs: number,
    failures: ProviderFailure[],
    signal?: AbortSignal,
  ): Promise<RawDocument[]> {
    const top = results.slice(0, this.options.deepFetchCount);
    const rest = results.slice(this.options.deepFetchCount).map(r => webResultToDocument(r, searchProvider));

    if (top.length === 0) return rest;
    if (remainingMs <= 0 || this.sources.scrapers.length === 0) {
      return [...top.map(r => webResultToDocument(r, searchProvider)), ...rest];
    }

    const tasks = top.map((result) => ({
      name: `scrape:${result.url}`,
      run: async (taskSignal: AbortSignal) => {
        const pageFailures: ProviderFailure[] = [];
        for (const scraper of this.sources.scrapers) {
          try {
            const page = await scraper.scrape(result.url, this.options.deepFetchChars, taskSignal);
            if (page.text.trim()) return { document: scrapedPageToDocument(page, result), pageFailures };
            pageFailures.push(toFailure(scraper.provider, 'scrape', new Error(`No readable text at ${result.url}`)));
          } catch (err) {
            if (taskSignal.aborted) throw err;
            pageFailures.push(toFailure(scraper.provider, 'scrape', err));
          }
        }
        return { document: webResultToDocument(result, searchProvider), pageFailures };
      },
    }));

    const outcomes = await fanOut(tasks, this.fanOutOptions(remainingMs, signal));
    return [
      ...outcomes.map((outcome, i) => {
        if (outcome.status === 'fulfilled') {
          failures.push(...outcome.value.pageFailures);
          return outcome.value.document;
        }
        failures.push(toFailure(this.sources.scrapers[0].provider, 'scrape', outcome.error));
        return webResultToDocument(top[i], searchProvider);
      }),
      ...rest,
    ];
  }

  private fanOutOptions(deadlineMs: number, abortSignal?: AbortSignal) {
    return {
      concurrency: this.options.concurrency,
      timeoutMs: this.options.timeoutMs,
      deadlineMs,
      abortSignal,
    };
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Entity-specific payloads must be about the requested symbol. */
function assertSymbol(provider: ProviderId, operation: string, returned: string, entity: Entity): void {
  const got = returned.toUpperCase();
  if (got !== entity.symbol && got !== entity.baseSymbol) {
    throw new ProviderUnavailableError(provider, operation, `returned ${got} for ${entity.symbol}`);
  }
}

/** Articles tagged with other symbols only are dropped. */
function isAbout(article: NewsArticle, entity: Entity): boolean {
  if (article.symbols.length === 0) return true;
  return article.symbols.some((s) => {
    const upper = s.toUpperCase();
    return upper === entity.symbol || upper === entity.baseSymbol;
  });
}

export function toFailure(provider: ProviderId, operation: string, error: unknown): ProviderFailure {
  const message = error instanceof Error ? error.message : String(error);
  return { provider, operation, category: classifyError(error), message: redactSecrets(message) };
}

/** First document wins for each url + title pair. */
export function dedupe(documents: RawDocument[]): RawDocument[] {
  const seen = new Set<string>();
  const unique: RawDocument[] = [];
  for (const doc of documents) {
    const key = `${doc.url}\n${doc.title.trim().toLowerCase()}`;
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(doc);
  }
  return unique;
}
