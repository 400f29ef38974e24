/**
 * Unit Tests for the Receipt Text Normalizer
 */

import { describe, it, expect } from 'vitest';
import { normalizeText, toLines } from './text-normalizer';

describe('normalizeText', () => {
  it('returns an empty string for empty input', () => {
    expect(normalizeText('')).toBe('');
  });

  it('unifies line endings, trims lines and drops blank ones', () => {
    const raw = '  WALMART  \r\n\r\n 01/15/2024\rTOTAL   $45.67  ';
    expect(normalizeText(raw)).toBe('WALMART\n01/15/2024\nTOTAL $45.67');
  });

  it('maps tabs and non-breaking spaces to single spaces', () => {
    expect(normalizeText('TOTAL\t\u00a0$5.00')).toBe('TOTAL $5.00');
  });

  it('drops zero-width characters', () => {
    expect(normalizeText('WAL\u200bMART\ufeff')).toBe('WALMART');
  });

  it('folds full-width digits', () => {
    expect(normalizeText('\uff14\uff15.\uff16\uff17')).toBe('45.67');
  });

  it('repairs currency symbols decoded with the wrong charset', () => {
    expect(normalizeText('Total \u00c2\u00a312.00')).toBe('Total \u00a312.00');
    expect(normalizeText('\u00e2\u201a\u00ac5.00')).toBe('\u20ac5.00');
  });

  it('upper-cases currency codes', () => {
    expect(normalizeText('total 5.00 usd')).toBe('total 5.00 USD');
  });

  it('treats Unicode line separators as line breaks', () => {
    expect(normalizeText('A\u2028B\u2029C')).toBe('A\nB\nC');
  });

  it('is idempotent', () => {
    const once = normalizeText(' Corner  Cafe \r\n\tLatte  4.50 ');
    expect(normalizeText(once)).toBe(once);
  });
});

describe('toLines', () => {
  it('has no lines for empty text', () => {
    expect(toLines('')).toEqual([]);
  });

  it('splits on newlines', () => {
    expect(toLines('a\nb')).toEqual(['a', 'b']);
  });
});
