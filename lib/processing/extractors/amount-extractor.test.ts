/**
 * Unit Tests for the Amount Extractor
 */

import { describe, it, expect } from 'vitest';
import { AmountExtractor, findMoneyTokens } from './amount-extractor';

const extractor = new AmountExtractor();

describe('AmountExtractor', () => {
  it('takes the value on the total line', () => {
    expect(extractor.extract('WALMART\n01/15/2024\nTOTAL $45.67')).toEqual({
      value: 45.67,
      confidence: 0.95,
      source: 'Total keyword',
    });
  });

  it('skips subtotal and tax lines', () => {
    const text = 'SUBTOTAL $46.48\nTAX (8.25%) $3.83\nTOTAL $50.31';
    expect(extractor.extract(text).value).toBe(50.31);
  });

  it('gives strong keywords the highest confidence', () => {
    expect(extractor.extract('Subtotal 20.00\nAmount Due: $21.60')).toEqual({
      value: 21.6,
      confidence: 1,
      source: 'Strong total keyword',
    });
  });

  it('parses grouped thousands', () => {
    expect(extractor.extract('GRAND TOTAL $1,234.56').value).toBe(1234.56);
  });

  it('takes the next line when the keyword stands alone', () => {
    expect(extractor.extract('TOTAL\n$45.67')).toEqual({
      value: 45.67,
      confidence: 0.85,
      source: 'Total keyword (next line)',
    });
  });

  it('picks the largest value among total lines', () => {
    expect(extractor.extract('TOTAL SAVINGS $5.00\nTOTAL $45.00').value).toBe(45);
  });

  it('falls back to the largest amount at low confidence', () => {
    expect(extractor.extract('Coffee 3.50\nMuffin 2.25')).toEqual({
      value: 3.5,
      confidence: 0.5,
      source: 'Largest amount',
    });
  });

  it('matches total keywords on word boundaries', () => {
    const result = extractor.extract('TOTALLY AWESOME 5.00');
    expect(result.source).toBe('Largest amount');
    expect(result.value).toBe(5);
  });

  it('ignores dates and times', () => {
    expect(extractor.extract('01/15/2024 14:35\nTOTAL 12.00')).toEqual({
      value: 12,
      confidence: 0.9,
      source: 'Total keyword',
    });
  });

  it('accepts a whole-number total at the end of a total line', () => {
    expect(extractor.extract('CORNER SHOP\nTOTAL 45')).toEqual({
      value: 45,
      confidence: 0.9,
      source: 'Total keyword',
    });
    expect(extractor.extract('Amount Due 1,200').value).toBe(1200);
  });

  it('does not read a time on a total line as a whole-number total', () => {
    expect(extractor.extract('TOTAL 14:35\n$9.99').value).toBe(9.99);
  });

  it('returns nothing without a money-like number', () => {
    expect(extractor.extract('Thank you\nStore 42')).toEqual({
      value: null,
      confidence: 0,
      source: null,
    });
  });
});

describe('findMoneyTokens', () => {
  it('keeps numbers with cents or a currency symbol', () => {
    expect(findMoneyTokens('$12.99 2 @ 3.50')).toEqual([
      { value: 12.99, hasCurrency: true },
      { value: 3.5, hasCurrency: false },
    ]);
  });

  it('skips percentages', () => {
    expect(findMoneyTokens('TAX (8.25%)')).toEqual([]);
  });

  it('accepts currency codes', () => {
    expect(findMoneyTokens('TOTAL USD 40')).toEqual([{ value: 40, hasCurrency: true }]);
  });
});
