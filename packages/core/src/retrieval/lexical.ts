/**
 * Keyword handling for lexical scoring. Tokens are lower-case runs of
 * letters and digits; `$TSLA` and `tsla` are the same token.
 */

const STOP_WORDS = new Set([
  'the', 'a', 'an', 'is', 'was', 'are', 'were', 'be', 'been', 'being',
  'have', 'has', 'had', 'do', 'does', 'did', 'will', 'would', 'could',
  'should', 'may', 'might', 'can', 'shall', 'to', 'of', 'in', 'for',
  'on', 'with', 'at', 'by', 'from', 'as', 'into', 'through', 'during',
  'before', 'after', 'above', 'below', 'between', 'out', 'off', 'over',
  'under', 'again', 'further', 'then', 'once', 'and', 'but', 'or', 'nor',
  'not', 'so', 'yet', 'both', 'each', 'few', 'more', 'most', 'other',
  'some', 'such', 'no', 'only', 'own', 'same', 'than', 'too', 'very',
  'its', 'their', 'this', 'that', 'these', 'those', 'it', 'he', 'she',
  'they', 'we', 'you', 'his', 'her', 'our', 'your', 'which', 'who',
  'whom', 'what', 'about', 'up', 'how', 'why', 'when', 'where', 'any',
  'all', 'there', 'here', 'just', 'now', 'today', 'i', 'me', 'my',
]);

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/['’]s\b/g, '')
    .split(/[^a-z0-9]+/)
    .filter(t => t.length > 0);
}

/** Distinct tokens in a text, for content-side matching. */
export function tokenSet(text: string): Set<string> {
  return new Set(tokenize(text));
}

/** Distinct significant query words: stop words and single characters removed. */
export function extractKeywords(text: string): string[] {
  return [...new Set(tokenize(text).filter(t => t.length > 1 && !STOP_WORDS.has(t)))];
}

/** Share of keywords present in the token set, in [0, 1]. */
export function keywordOverlap(keywords: string[], tokens: Set<string>): number {
  if (keywords.length === 0) return 0;
  let hits = 0;
  for (const keyword of keywords) {
    if (tokens.has(keyword)) hits++;
  }
  return hits / keywords.length;
}
