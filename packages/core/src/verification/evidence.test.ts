import { describe, it, expect } from 'vitest';
import { EvidenceSet, extractFigures, extractNumbers, numbersMatch, splitSentences } from './evidence.js';

describe('extractFigures', () => {
  it('finds percentages and scaled amounts, skipping years and citation markers', () => {
    const figures = extractFigures('Revenue rose 12.5% to $1.2 billion in 2025 [1].');

    expect(figures.map(f => f.raw)).toEqual(['12.5%', '$1.2 billion']);
    expect(figures[1].value).toBe(1.2);
    expect(figures[1].candidates).toHaveLength(1);
    expect(figures[1].candidates[0].value).toBeCloseTo(1.2e9, 0);
    expect(figures[0].candidates[1].value).toBeCloseTo(0.125, 10);
  });

  it('skips list ordinals', () => {
    const figures = extractFigures('1. Shares rose 4%\n2. Volume was 3 million');
    expect(figures.map(f => f.raw)).toEqual(['4%', '3 million']);
  });

  it('skips calendar dates', () => {
    expect(extractFigures('On October 16, shares closed at 250.5.').map(f => f.raw)).toEqual(['250.5']);
    expect(extractFigures('Filed on 2026-10-16.')).toEqual([]);
  });

  it('skips compound words and quarter labels', () => {
    expect(extractFigures('Q3 sales neared the 52-week high')).toEqual([]);
  });

  it('keeps a year written as money', () => {
    expect(extractFigures('The stock hit $2000').map(f => f.value)).toEqual([2000]);
  });
});

describe('EvidenceSet.supports', () => {
  const evidence = new EvidenceSet(['Tesla shares closed at $250.50 after deliveries of 435,000 vehicles.']);

  it('does not let a bare number back a scaled figure', () => {
    expect(evidence.unsupportedFigures('Market cap is $250 billion.').map(f => f.raw)).toEqual(['$250 billion']);
    expect(evidence.unsupportedFigures('Revenue was ₹250 crore.').map(f => f.raw)).toEqual(['₹250 crore']);
  });

  it('matches a scaled figure against the written-out or scaled evidence value', () => {
    const scaled = new EvidenceSet(['Market value reached $790.2 billion, with 3,100,000 shares traded.']);
    expect(scaled.unsupportedFigures('Tesla is worth $790 billion on 3.1 million shares.')).toEqual([]);
  });

  it('matches a percentage as written or as a fraction', () => {
    const fraction = new EvidenceSet(['Gross margin: 0.182']);
    expect(fraction.unsupportedFigures('Margin was 18.2%.')).toEqual([]);
  });
});

describe('extractNumbers', () => {
  it('adds scaled values', () => {
    expect(extractNumbers('Market cap 1.5T, volume 2,500,000')).toEqual([1.5, 1.5e12, 2500000]);
  });
});

describe('numbersMatch', () => {
  it('accepts differences within the rounding half-unit', () => {
    expect(numbersMatch(250, 250.4, 0, 0.5)).toBe(true);
    expect(numbersMatch(250, 250.6, 0, 0.5)).toBe(false);
  });

  it('accepts differences within the relative tolerance', () => {
    expect(numbersMatch(100, 100.9, 0.01)).toBe(true);
    expect(numbersMatch(100, 102, 0.01)).toBe(false);
  });

  it('compares magnitudes', () => {
    expect(numbersMatch(-5.5, 5.5, 0)).toBe(true);
  });
});

describe('splitSentences', () => {
  it('splits on terminal punctuation but not decimals', () => {
    expect(splitSentences('Shares rose 2.5%. Volume fell!\nNext line')).toEqual([
      ['Shares rose 2.5%.', 'Volume fell!'],
      ['Next line'],
    ]);
  });
});

describe('EvidenceSet', () => {
  const evidence = new EvidenceSet(['Tesla reported revenue of $25.2 billion. Shares rose 4.1% to 250.50.']);

  it('supports figures present in evidence, rounded or scaled', () => {
    expect(evidence.unsupportedFigures('Revenue was $25.2 billion and shares rose 4%.')).toEqual([]);
    expect(evidence.unsupportedFigures('Revenue was 25,200,000,000 dollars.')).toEqual([]);
  });

  it('reports figures absent from evidence', () => {
    const missing = evidence.unsupportedFigures('Shares rose 9% to $270.');
    expect(missing.map(f => f.raw)).toEqual(['9%', '$270']);
  });

  it('strips sentences with unsupported figures', () => {
    const result = evidence.stripUnsupported(
      'Revenue was $25.2 billion [1]. Shares jumped 9% on the news [2]. Analysts remain cautious.',
    );

    expect(result.text).toBe('Revenue was $25.2 billion [1]. Analysts remain cautious.');
    expect(result.removed).toEqual(['Shares jumped 9% on the news [2].']);
  });

  it('strips sentences repeating a flagged claim', () => {
    const result = evidence.stripUnsupported(
      'Tesla beat delivery estimates this quarter. Margins improved.',
      ['Tesla beat delivery estimates'],
    );
    expect(result.text).toBe('Margins improved.');
  });

  it('drops lines that lose every sentence and keeps blank separators', () => {
    const result = evidence.stripUnsupported('- Price is 250.5\n\n- Volume hit 99 million');
    expect(result.text).toBe('- Price is 250.5');
  });
});
