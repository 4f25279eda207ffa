import { describe, it, expect, vi, beforeEach } from 'vitest';
import { getStockNews, parseFmpDate } from './fmp.js';
import type { ToolContext } from '../types.js';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

beforeEach(() => {
  mockFetch.mockReset();
});

const context: ToolContext = { config: { fmpApiKey: 'test-secret' } };

describe('FMP stock news', () => {
  it('maps stock news items', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      json: async () => [{
        symbol: 'TSLA',
        publishedDate: '2024-04-02 09:30:00',
        title: 'Tesla shares slip',
        text: 'Shares fell in premarket trading.',
        site: 'example.com',
        url: 'https://example.com/tsla-slip',
      }],
    });

    const articles = await getStockNews('TSLA', 20, context);

    expect(mockFetch.mock.calls[0][0]).toBe(
      'https://financialmodelingprep.com/api/v3/stock_news?tickers=TSLA&limit=20&apikey=test-secret',
    );
    expect(articles).toEqual([{
      title: 'Tesla shares slip',
      description: 'Shares fell in premarket trading.',
      url: 'https://example.com/tsla-slip',
      source: 'example.com',
      publishedAt: '2024-04-02T09:30:00.000Z',
      provider: 'fmp',
      symbols: ['TSLA'],
    }]);
  });

  it('rejects payloads that are not arrays', async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, json: async () => ({ 'Error Message': 'Limit reached' }) });

    await expect(getStockNews('TSLA', 20, context)).rejects.toThrow('Unexpected FMP stock news response');
  });
});

describe('parseFmpDate', () => {
  it('handles missing and malformed dates', () => {
    expect(parseFmpDate(undefined)).toBeNull();
    expect(parseFmpDate('yesterday')).toBeNull();
  });
});
