import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createSources } from './sources.js';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

beforeEach(() => {
  mockFetch.mockReset();
});

describe('createSources', () => {
  it('includes only providers that have keys', () => {
    const sources = createSources({ finnhubApiKey: 'test-secret' });

    expect(sources.news.map(n => n.provider)).toEqual(['finnhub']);
    expect(sources.marketData).toBeUndefined();
    expect(sources.webSearch).toBeUndefined();
    expect(sources.exchange?.provider).toBe('nse');
    expect(sources.scrapers.map(s => s.provider)).toEqual(['http']);
  });

  it('orders Firecrawl before the plain fetch fallback', () => {
    const sources = createSources({ firecrawlApiKey: 'test-secret', braveApiKey: 'test-secret' });

    expect(sources.scrapers.map(s => s.provider)).toEqual(['firecrawl', 'http']);
    expect(sources.news.map(n => n.provider)).toEqual(['brave']);
    expect(sources.webSearch?.provider).toBe('brave-web');
  });

  it('keyword-filters the general feed for providers without search', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      json: async () => [
        { headline: 'Fed signals rate cut in June', url: 'https://example.com/fed', datetime: 1712059200 },
        { headline: 'Oil prices climb', url: 'https://example.com/oil', datetime: 1712059200 },
      ],
    });

    const [finnhub] = createSources({ finnhubApiKey: 'test-secret' }).news;
    const articles = await finnhub.searchNews('Will the Fed cut rates?');

    expect(articles.map(a => a.url)).toEqual(['https://example.com/fed']);
  });
});
