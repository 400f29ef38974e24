/**
 * Unit Tests for the Date Extractor
 */

import { describe, it, expect } from 'vitest';
import { DateExtractor } from './date-extractor';
import { createExtractionConfig } from '../extraction-config';

const extractor = new DateExtractor();

describe('DateExtractor', () => {
  it('reads US numeric dates', () => {
    expect(extractor.extract('WALMART\n01/15/2024\nTOTAL $45.67')).toEqual({
      value: '2024-01-15',
      confidence: 0.85,
      source: 'MM/DD/YYYY',
    });
  });

  it('reads ISO dates with the highest base confidence', () => {
    expect(extractor.extract('2024-01-15 08:45:23')).toEqual({
      value: '2024-01-15',
      confidence: 0.95,
      source: 'YYYY-MM-DD',
    });
  });

  it('reads written dates and boosts a date label on the same line', () => {
    expect(extractor.extract('Server: John\nDate: January 15, 2024')).toEqual({
      value: '2024-01-15',
      confidence: 0.95,
      source: 'Month DD, YYYY',
    });
  });

  it('reads day-month-year written dates', () => {
    const result = extractor.extract('15 Jan 2024');
    expect(result.value).toBe('2024-01-15');
    expect(result.source).toBe('DD Month YYYY');
    expect(result.confidence).toBe(0.88);
  });

  it('falls back to day-first when the US reading is impossible', () => {
    expect(extractor.extract('25/12/2023')).toEqual({
      value: '2023-12-25',
      confidence: 0.7,
      source: 'DD/MM/YYYY',
    });
  });

  it('gives two-digit years the lowest confidence', () => {
    expect(extractor.extract('Date 01/15/24')).toEqual({
      value: '2024-01-15',
      confidence: 0.65,
      source: 'MM/DD/YY',
    });
  });

  it('follows pattern order rather than text position', () => {
    expect(extractor.extract('03/04/2024\n2024-05-06').value).toBe('2024-05-06');
  });

  it('rejects impossible calendar dates instead of clamping them', () => {
    expect(extractor.extract('13/45/2024').value).toBeNull();
    expect(extractor.extract('02/30/2024').value).toBeNull();
  });

  it('rejects years outside the configured range', () => {
    expect(extractor.extract('01/15/1850').value).toBeNull();

    const narrow = new DateExtractor(
      createExtractionConfig({ date: { minYear: 2020, maxYear: 2030 } }).date
    );
    expect(narrow.extract('01/15/2019').value).toBeNull();
    expect(narrow.extract('01/15/2021').value).toBe('2021-01-15');
  });

  it('returns nothing when no date is present', () => {
    expect(extractor.extract('TOTAL $45.67')).toEqual({
      value: null,
      confidence: 0,
      source: null,
    });
  });
});
