/**
 * Unit Tests for the Export Service
 */

import { describe, it, expect } from 'vitest';
import { CSV_HEADERS, escapeCSV, exportRecords } from './export-service';
import { InvalidQueryError } from '@/lib/errors';
import { createReceiptRecord } from '@/tests/factories/receipt';
import type { ReceiptRecord } from '@/types/receipt';

const CREATED_AT = new Date('2024-01-20T08:00:00.000Z');

function sampleRecords(): ReceiptRecord[] {
  return [
    createReceiptRecord({
      id: 'r-1',
      rawText: 'CORNER CAFE\nTOTAL $12.50',
      vendor: 'Corner Cafe, Downtown',
      transactionDate: '2024-01-20',
      amount: 12.5,
      category: 'restaurant',
      confidence: { vendor: 0.9, date: 0.8, amount: 0.95, category: 0.5 },
      overallConfidence: 0.8,
      createdAt: CREATED_AT,
    }),
    createReceiptRecord({
      id: 'r-2',
      rawText: '',
      vendor: null,
      transactionDate: null,
      amount: null,
      category: 'other',
      source: 'manually-labeled',
      confidence: { vendor: 0, date: 0, amount: 0, category: 1 },
      overallConfidence: 0.1,
      createdAt: CREATED_AT,
    }),
  ];
}

describe('exportRecords', () => {
  describe('CSV', () => {
    it('writes one row per record under a header', () => {
      const result = exportRecords(sampleRecords(), 'csv');

      expect(result.content.split('\n')).toEqual([
        CSV_HEADERS.join(','),
        'r-1,"Corner Cafe, Downtown",2024-01-20,12.50,restaurant,auto-detected,0.9,0.8,0.95,0.5,0.8,2024-01-20T08:00:00.000Z',
        'r-2,,,,other,manually-labeled,0,0,0,1,0.1,2024-01-20T08:00:00.000Z',
      ]);
      expect(result.mimeType).toBe('text/csv;charset=utf-8');
    });

    it('writes only the header for no records', () => {
      expect(exportRecords([], 'csv').content).toBe(CSV_HEADERS.join(','));
    });
  });

  describe('JSON', () => {
    it('writes ISO timestamps and leaves out raw text', () => {
      const result = exportRecords(sampleRecords(), 'json');
      const parsed: unknown = JSON.parse(result.content);

      expect(result.mimeType).toBe('application/json');
      expect(Array.isArray(parsed) && parsed[0]).toEqual({
        id: 'r-1',
        vendor: 'Corner Cafe, Downtown',
        transactionDate: '2024-01-20',
        amount: 12.5,
        category: 'restaurant',
        source: 'auto-detected',
        confidence: { vendor: 0.9, date: 0.8, amount: 0.95, category: 0.5 },
        overallConfidence: 0.8,
        createdAt: '2024-01-20T08:00:00.000Z',
        updatedAt: '2024-01-20T08:00:00.000Z',
      });
    });

    it('includes raw text on request', () => {
      const result = exportRecords(sampleRecords(), 'json', { includeRawText: true });

      expect(result.content).toContain('"rawText": "CORNER CAFE\\nTOTAL $12.50"');
    });

    it('pretty-prints with two spaces', () => {
      expect(exportRecords(sampleRecords(), 'json').content.split('\n')[1]).toBe('  {');
    });
  });

  it('dates the filename', () => {
    const now = new Date('2024-03-05T12:00:00.000Z');

    expect(exportRecords([], 'csv', { now }).filename).toBe('receipt-ledger-records-2024-03-05.csv');
    expect(exportRecords([], 'json', { now }).filename).toBe('receipt-ledger-records-2024-03-05.json');
  });

  it('rejects an unknown format', () => {
    expect(() => exportRecords([], 'xml' as unknown as 'csv')).toThrow(InvalidQueryError);
  });
});

describe('escapeCSV', () => {
  it('quotes values with separators and doubles quotes', () => {
    expect(escapeCSV('Joe "The" Diner')).toBe('"Joe ""The"" Diner"');
    expect(escapeCSV('two\nlines')).toBe('"two\nlines"');
    expect(escapeCSV('plain')).toBe('plain');
  });

  it('quotes values holding a carriage return', () => {
    expect(escapeCSV('Joe\rDiner')).toBe('"Joe\rDiner"');
    expect(escapeCSV('two\r\nlines')).toBe('"two\r\nlines"');
  });

  it('writes absent values as empty cells', () => {
    expect(escapeCSV(null)).toBe('');
    expect(escapeCSV(undefined)).toBe('');
    expect(escapeCSV(0)).toBe('0');
  });
});
