/**
 * Evidence containment: every figure an answer states must appear, within
 * tolerance, somewhere in the evidence it was written from.
 */

/** Default relative tolerance for figure matching (1%). */
export const DEFAULT_TOLERANCE = 0.01;

const SCALES: Record<string, number> = {
  trillion: 1e12, tn: 1e12, t: 1e12,
  billion: 1e9, bn: 1e9, b: 1e9,
  crore: 1e7, cr: 1e7,
  million: 1e6, mn: 1e6, m: 1e6,
  lakh: 1e5,
  thousand: 1e3, k: 1e3,
};

// Optional currency sign, the number, then an optional scale word, percent or multiple.
const FIGURE_PATTERN =
  /(?<![\w.:])([$₹€£]\s?)?((?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?)(?:\s?(%|percent\b|trillion|billion|million|thousand|crore|lakh|tn|bn|mn|cr|[tbmk](?![a-z])|x(?![a-z])))?(?![\w:]|-[a-z])/gi;

const CITATION_MARKER = /\[\d+(?:\s*,\s*\d+)*\]/g;
const LIST_ORDINAL = /^(\s*)\d{1,2}[.)](?=\s)/gm;
const MONTH =
  '(?:jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)\\.?';
const CALENDAR_DATE = new RegExp(
  `\\b${MONTH}\\s+\\d{1,2}(?:st|nd|rd|th)?\\b|\\b\\d{1,2}(?:st|nd|rd|th)?\\s+${MONTH}(?![a-z])|\\b\\d{4}-\\d{2}-\\d{2}\\b`,
  'gi',
);

export interface Figure {
  /** The figure as written. */
  raw: string;
  value: number;
  /** Values the figure may appear as in evidence: scaled when it has a scale word, percent also as a fraction. */
  candidates: Array<{ value: number; halfUnit: number }>;
}

function blank(match: string): string {
  return ' '.repeat(match.length);
}

/** Citation markers, list ordinals and calendar dates are not claims; blank them out in place. */
function maskNonFigures(text: string): string {
  return text
    .replace(CITATION_MARKER, blank)
    .replace(CALENDAR_DATE, blank)
    .replace(LIST_ORDINAL, (match: string, indent: string) => indent + blank(match.slice(indent.length)));
}

function isYear(digits: string, prefix: string | undefined, suffix: string | undefined): boolean {
  if (prefix || suffix || !/^\d{4}$/.test(digits)) return false;
  const n = Number(digits);
  return n >= 1900 && n <= 2100;
}

function decimalsOf(digits: string): number {
  const dot = digits.indexOf('.');
  return dot === -1 ? 0 : digits.length - dot - 1;
}

/** Figures stated in an answer, years, citation markers and list ordinals excluded. */
export function extractFigures(text: string): Figure[] {
  const figures: Figure[] = [];
  for (const m of maskNonFigures(text).matchAll(FIGURE_PATTERN)) {
    const [raw, prefix, digits, suffixRaw] = m;
    const suffix = suffixRaw?.toLowerCase();
    if (isYear(digits, prefix, suffix)) continue;

    const value = Number(digits.replace(/,/g, ''));
    if (!Number.isFinite(value)) continue;

    const halfUnit = 0.5 * Math.pow(10, -decimalsOf(digits));
    const scale = suffix ? SCALES[suffix] : undefined;
    // A scaled figure only matches its scaled value: "$250 billion" is not backed by a $250.50 price.
    const candidates = scale !== undefined
      ? [{ value: value * scale, halfUnit: halfUnit * scale }]
      : [{ value, halfUnit }];
    if (suffix === '%' || suffix === 'percent') {
      candidates.push({ value: value / 100, halfUnit: halfUnit / 100 });
    }

    figures.push({ raw: raw.trim(), value, candidates });
  }
  return figures;
}

/** Every number in a text, plus the scaled value when a scale word follows it. */
export function extractNumbers(text: string): number[] {
  const numbers: number[] = [];
  for (const m of text.matchAll(FIGURE_PATTERN)) {
    const value = Number(m[2].replace(/,/g, ''));
    if (!Number.isFinite(value)) continue;
    numbers.push(value);
    const scale = m[3] ? SCALES[m[3].toLowerCase()] : undefined;
    if (scale !== undefined) numbers.push(value * scale);
  }
  return numbers;
}

/**
 * Check if two numbers match within a relative tolerance, or within the
 * half-unit of the claimed figure's last written digit.
 */
export function numbersMatch(claimed: number, found: number, tolerance: number, halfUnit = 0): boolean {
  const diff = Math.abs(Math.abs(claimed) - Math.abs(found));
  if (diff <= halfUnit + Number.EPSILON * Math.abs(claimed)) return true;
  return diff <= tolerance * Math.max(Math.abs(claimed), Math.abs(found));
}

/** Split into sentences, keeping line structure. */
export function splitSentences(text: string): string[][] {
  return text.split('\n').map(line =>
    line.split(/(?<=[.!?])\s+(?=\S)/).filter(s => s.trim().length > 0),
  );
}

const MIN_CLAIM_CHARS = 20;

export interface StrippedText {
  text: string;
  removed: string[];
}

/** The numbers available to back up an answer. */
export class EvidenceSet {
  private readonly numbers: number[];

  constructor(
    texts: string[],
    readonly tolerance: number = DEFAULT_TOLERANCE,
  ) {
    this.numbers = texts.flatMap(extractNumbers);
  }

  get size(): number {
    return this.numbers.length;
  }

  supports(figure: Figure): boolean {
    return figure.candidates.some(c =>
      this.numbers.some(n => numbersMatch(c.value, n, this.tolerance, c.halfUnit)),
    );
  }

  unsupportedFigures(text: string): Figure[] {
    return extractFigures(text).filter(f => !this.supports(f));
  }

  /**
   * Drop sentences with an unsupported figure, or that repeat one of the
   * given claim strings. Lines left empty are dropped too.
   */
  stripUnsupported(text: string, claims: string[] = []): StrippedText {
    const removed: string[] = [];
    const needles = claims.map(c => c.trim().toLowerCase()).filter(c => c.length > 0);

    const lines = splitSentences(text).map(sentences => {
      const kept = sentences.filter(sentence => {
        const lower = sentence.toLowerCase();
        const bad = this.unsupportedFigures(sentence).length > 0 ||
          needles.some(n => lower.includes(n) || (lower.trim().length >= MIN_CLAIM_CHARS && n.includes(lower.trim())));
        if (bad) removed.push(sentence.trim());
        return !bad;
      });
      return { had: sentences.length > 0, text: kept.join(' ') };
    });

    const out = lines
      .filter(l => !l.had || l.text.length > 0)
      .map(l => l.text)
      .join('\n')
      .replace(/\n{3,}/g, '\n\n')
      .trim();

    return { text: out, removed };
  }
}
