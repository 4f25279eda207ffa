import { describe, it, expect } from 'vitest';
import { extractReadableText, truncateText } from './extract.js';

const ARTICLE_HTML = `<html><head><title>Fed holds rates</title>
<meta property="article:published_time" content="2024-03-20T18:00:00Z"></head>
<body><nav>Home | Markets</nav>
<article><h1>Fed holds rates steady</h1>
<p>The Federal Reserve kept rates at 5.25%
   to 5.5%.</p><script>track()</script>
<p>Officials still see three cuts.</p></article>
<footer>Copyright</footer></body></html>`;

describe('extractReadableText', () => {
  it('keeps article blocks and drops boilerplate', () => {
    expect(extractReadableText(ARTICLE_HTML)).toEqual({
      title: 'Fed holds rates',
      text: 'Fed holds rates steady\nThe Federal Reserve kept rates at 5.25% to 5.5%.\nOfficials still see three cuts.',
      publishedAt: '2024-03-20T18:00:00.000Z',
    });
  });

  it('falls back to body text when there are no block elements', () => {
    const page = extractReadableText('<html><body><div>Only   a div</div></body></html>');
    expect(page.text).toBe('Only a div');
    expect(page.title).toBe('');
    expect(page.publishedAt).toBeNull();
  });
});

describe('truncateText', () => {
  it('returns short text unchanged', () => {
    expect(truncateText('short', 10)).toBe('short');
  });

  it('cuts at a sentence boundary inside the budget', () => {
    expect(truncateText('First sentence here. Second sentence is longer.', 30)).toBe('First sentence here.');
  });

  it('hard-cuts when no boundary is close enough', () => {
    expect(truncateText('abcdefghij klmnopqrst', 8)).toBe('abcdefgh');
  });
});
