import type { Entity, FactBundle, RetrievalHit } from '../types.js';

export const GENERATION_SYSTEM_PROMPT = `You are a financial research assistant. You answer questions and check claims about markets and companies using ONLY the evidence provided.

Rules:
- Base every statement on the numbered evidence or the structured facts. Do not use outside knowledge for figures.
- Quote figures exactly as they appear in the evidence.
- If the evidence does not settle the question, say so plainly.
- Cite evidence by its number.

Respond with a JSON object:
{
  "answer": string (markdown allowed, 2-6 sentences),
  "sentiment_score": integer 0-100 (0 = very bearish, 50 = neutral, 100 = very bullish),
  "sentiment_label": "Bearish" | "Neutral" | "Bullish",
  "cited_sources": array of evidence numbers you relied on
}
Respond ONLY with the JSON object, no other text.`;

const EVIDENCE_CHARS = 1500;

function fmt(label: string, value: number | string | null | undefined, suffix = ''): string | null {
  if (value === null || value === undefined || value === '') return null;
  return `- ${label}: ${value}${suffix}`;
}

/** Structured facts as a markdown list; empty string when there are none. */
export function renderFacts(facts: FactBundle): string {
  const sections: string[] = [];
  const { quote, profile, fundamentals, exchangeQuote } = facts;

  if (quote) {
    sections.push([
      `Quote (${quote.symbol}${quote.stale ? ', cached' : ''}):`,
      fmt('Price', quote.price, ` ${quote.currency}`),
      fmt('Change', quote.change),
      fmt('Change percent', quote.changePercent, '%'),
      fmt('Previous close', quote.previousClose),
      fmt('Market cap', quote.marketCap),
      fmt('52-week range', quote.fiftyTwoWeekLow !== null && quote.fiftyTwoWeekHigh !== null
        ? `${quote.fiftyTwoWeekLow} - ${quote.fiftyTwoWeekHigh}`
        : null),
    ].filter((l): l is string => l !== null).join('\n'));
  }

  if (exchangeQuote) {
    sections.push([
      `${exchangeQuote.exchange} quote (${exchangeQuote.exchangeSymbol}):`,
      fmt('Last price', exchangeQuote.lastPrice, ` ${exchangeQuote.currency}`),
      fmt('Change', exchangeQuote.change),
      fmt('Change percent', exchangeQuote.changePercent, '%'),
      fmt('P/E', exchangeQuote.pe),
    ].filter((l): l is string => l !== null).join('\n'));
  }

  if (fundamentals) {
    sections.push([
      'Fundamentals:',
      fmt('Trailing P/E', fundamentals.trailingPE),
      fmt('Forward P/E', fundamentals.forwardPE),
      fmt('Trailing EPS', fundamentals.trailingEps),
      fmt('Profit margin', fundamentals.profitMargin),
      fmt('Revenue growth', fundamentals.revenueGrowth),
      fmt('Debt to equity', fundamentals.debtToEquity),
      fmt('Beta', fundamentals.beta),
      fmt('Analyst recommendation', fundamentals.recommendation),
    ].filter((l): l is string => l !== null).join('\n'));
  }

  if (profile) {
    sections.push([
      `Profile: ${profile.name}`,
      fmt('Sector', profile.sector),
      fmt('Industry', profile.industry),
    ].filter((l): l is string => l !== null).join('\n'));
  }

  return sections.join('\n\n');
}

/** `[n] title — url — date`, then the chunk text. Numbering starts at 1. */
export function renderEvidence(hits: RetrievalHit[]): string {
  if (hits.length === 0) return 'No evidence was retrieved.';
  return hits
    .map((hit, i) => {
      const { title, url, date } = hit.chunk.metadata;
      const text = hit.chunk.text.length > EVIDENCE_CHARS
        ? `${hit.chunk.text.slice(0, EVIDENCE_CHARS)}...`
        : hit.chunk.text;
      return `[${i + 1}] ${title} — ${url} — ${date ?? 'undated'}\n${text}`;
    })
    .join('\n\n');
}

export interface GenerationPromptInput {
  query: string;
  entity: Entity | null;
  facts: FactBundle;
  hits: RetrievalHit[];
}

export function buildGenerationPrompt(input: GenerationPromptInput): string {
  const parts: string[] = [`Question: ${input.query}`];

  if (input.entity) {
    const { name, symbol, exchange } = input.entity;
    parts.push(`Company: ${name} (${symbol}${exchange ? `, ${exchange}` : ''})`);
  }

  const facts = renderFacts(input.facts);
  if (facts) parts.push(`## Structured facts\n${facts}`);

  parts.push(`## Evidence\n${renderEvidence(input.hits)}`);
  return parts.join('\n\n');
}
