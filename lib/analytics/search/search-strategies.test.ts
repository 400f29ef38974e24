/**
 * Unit Tests for the Search Strategies
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  SEARCH_STRATEGIES,
  buildHashIndex,
  compilePattern,
  fuzzyThreshold,
  search,
  searchAll,
} from './index';
import { InvalidQueryError, PatternError, UnsupportedFieldError } from '@/lib/errors';
import { createReceiptRecord, createSampleLedger, resetIdCounter } from '@/tests/factories/receipt';
import { applyReceiptPatch } from '@/lib/processing/record-editor';
import { sortRecords } from '../sort';
import type { KeyField, RangeField, SearchQuery } from '@/types/analytics';
import type { ReceiptRecord } from '@/types/receipt';

function ids(records: readonly ReceiptRecord[]): string[] {
  return records.map((record) => record.id.replace('test-id-', ''));
}

let ledger: ReceiptRecord[];

beforeEach(() => {
  resetIdCounter();
  ledger = createSampleLedger();
});

describe('linear search', () => {
  it('matches a keyword case-insensitively', () => {
    expect(ids(search(ledger, { strategy: 'linear', fields: 'vendor', keyword: 'WalMart' }))).toEqual([
      '1',
      '4',
    ]);
  });

  it('matches any of several fields', () => {
    const results = search(ledger, {
      strategy: 'linear',
      fields: ['vendor', 'category'],
      keyword: 'shop',
    });

    expect(ids(results)).toEqual(['8']);
  });

  it('supports whole-value matching', () => {
    expect(search(ledger, { strategy: 'linear', fields: 'vendor', keyword: 'corner', match: 'exact' })).toEqual([]);
    expect(
      ids(search(ledger, { strategy: 'linear', fields: 'vendor', keyword: 'corner cafe', match: 'exact' }))
    ).toEqual(['2', '7']);
  });

  it('rejects an empty keyword or field list', () => {
    expect(() => search(ledger, { strategy: 'linear', fields: 'vendor', keyword: '  ' })).toThrow(
      expect.objectContaining({ parameter: 'keyword' })
    );
    expect(() => search(ledger, { strategy: 'linear', fields: [], keyword: 'cafe' })).toThrow(
      expect.objectContaining({ parameter: 'fields' })
    );
  });
});

describe('hash search', () => {
  it('agrees with linear exact matching', () => {
    const linear = search(ledger, {
      strategy: 'linear',
      fields: 'vendor',
      keyword: 'WALMART',
      match: 'exact',
    });
    const hashed = search(ledger, { strategy: 'hash', field: 'vendor', value: 'WALMART' });

    expect(hashed).toEqual(linear);
    expect(ids(hashed)).toEqual(['1', '4']);
  });

  it('tells apart two versions of the same record', () => {
    const original = createReceiptRecord({ vendor: 'Walmart' });
    const corrected = applyReceiptPatch(original, { vendor: 'Target' });
    const versions = [original, corrected];

    const hashed = search(versions, { strategy: 'hash', field: 'vendor', value: 'walmart' });
    const linear = search(versions, {
      strategy: 'linear',
      fields: 'vendor',
      keyword: 'walmart',
      match: 'exact',
    });

    expect(hashed.map((record) => record.vendor)).toEqual(['Walmart']);
    expect(hashed).toEqual(linear);
    expect(hashed[0]).toBe(original);
  });

  it('compares amounts in cents', () => {
    expect(ids(search(ledger, { strategy: 'hash', field: 'amount', value: '12.50' }))).toEqual([
      '2',
      '7',
    ]);
  });

  it('returns nothing for an unknown value', () => {
    expect(search(ledger, { strategy: 'hash', field: 'category', value: 'travel' })).toEqual([]);
  });

  it('indexes ids by normalized value', () => {
    const index = buildHashIndex(ledger, 'amount');

    expect(index.size).toBe(6);
    expect(index.get(1250)).toEqual(['test-id-2', 'test-id-7']);
    expect(index.has(0)).toBe(false);
  });

  it('rejects free-text fields', () => {
    expect(() =>
      search(ledger, { strategy: 'hash', field: 'rawText' as unknown as KeyField, value: 'x' })
    ).toThrow(new UnsupportedFieldError('rawText', 'hash'));
  });
});

describe('binary search', () => {
  it('finds exact amounts', () => {
    expect(ids(search(ledger, { strategy: 'binary', field: 'amount', value: 12.5 }))).toEqual([
      '2',
      '7',
    ]);
  });

  it('finds vendor prefixes and date prefixes', () => {
    expect(
      ids(search(ledger, { strategy: 'binary', field: 'vendor', value: 'Corner', mode: 'prefix' }))
    ).toEqual(['2', '7']);
    expect(
      ids(
        search(ledger, {
          strategy: 'binary',
          field: 'transactionDate',
          value: '2024-02',
          mode: 'prefix',
        })
      )
    ).toEqual(['3', '4']);
  });

  it('gives the same answer with every sort algorithm and on presorted input', () => {
    const presorted = sortRecords(ledger, 'vendor');
    const expected = ['1', '4'];

    for (const algorithm of ['quicksort', 'heapsort', 'adaptive'] as const) {
      expect(
        ids(search(ledger, { strategy: 'binary', field: 'vendor', value: 'walmart', algorithm }))
      ).toEqual(expected);
    }
    expect(
      ids(search(presorted, { strategy: 'binary', field: 'vendor', value: 'walmart', presorted: true }))
    ).toEqual(expected);
  });

  it('returns nothing when the value is absent', () => {
    expect(search(ledger, { strategy: 'binary', field: 'amount', value: 1000 })).toEqual([]);
  });

  it('rejects prefix lookup on amounts and malformed dates', () => {
    expect(() =>
      search(ledger, { strategy: 'binary', field: 'amount', value: 12, mode: 'prefix' })
    ).toThrow(expect.objectContaining({ parameter: 'mode' }));
    expect(() =>
      search(ledger, { strategy: 'binary', field: 'transactionDate', value: '2024-13-01' })
    ).toThrow(InvalidQueryError);
  });
});

describe('fuzzy search', () => {
  it('tolerates a typo', () => {
    expect(ids(search(ledger, { strategy: 'fuzzy', field: 'vendor', keyword: 'WALMRT' }))).toEqual([
      '1',
      '4',
    ]);
  });

  it('matches single words of a vendor name', () => {
    expect(ids(search(ledger, { strategy: 'fuzzy', field: 'vendor', keyword: 'caffe' }))).toEqual([
      '2',
      '7',
    ]);
  });

  it('honours an explicit distance', () => {
    expect(
      search(ledger, { strategy: 'fuzzy', field: 'vendor', keyword: 'WALMRT', maxDistance: 0 })
    ).toEqual([]);
    expect(() =>
      search(ledger, { strategy: 'fuzzy', field: 'vendor', keyword: 'shell', maxDistance: -1 })
    ).toThrow(expect.objectContaining({ parameter: 'maxDistance' }));
  });

  it('derives the threshold from the keyword length', () => {
    expect(fuzzyThreshold('ab')).toBe(0);
    expect(fuzzyThreshold('abc')).toBe(1);
    expect(fuzzyThreshold('walmart')).toBe(2);
    expect(fuzzyThreshold('a'.repeat(30))).toBe(3);
    expect(fuzzyThreshold('a'.repeat(30), 5)).toBe(5);
  });
});

describe('pattern search', () => {
  it('matches case-insensitively by default', () => {
    expect(ids(search(ledger, { strategy: 'pattern', field: 'vendor', pattern: '^corner' }))).toEqual([
      '2',
      '7',
    ]);
  });

  it('respects explicit flags', () => {
    expect(
      ids(search(ledger, { strategy: 'pattern', field: 'vendor', pattern: '^walmart$', flags: '' }))
    ).toEqual(['4']);
  });

  it('rejects invalid expressions', () => {
    expect(() => search(ledger, { strategy: 'pattern', field: 'vendor', pattern: '(' })).toThrow(
      PatternError
    );
    expect(() => compilePattern('a'.repeat(257))).toThrow(PatternError);
    expect(() => compilePattern('abc', 'q')).toThrow(expect.objectContaining({ parameter: 'flags' }));
  });

  it('drops stateful flags', () => {
    expect(compilePattern('a', 'gi').flags).toBe('i');
  });
});

describe('range search', () => {
  it('filters amounts inclusively', () => {
    expect(ids(search(ledger, { strategy: 'range', field: 'amount', min: 15, max: 25 }))).toEqual([
      '4',
    ]);
    expect(ids(search(ledger, { strategy: 'range', field: 'amount', min: 12.5, max: 12.5 }))).toEqual([
      '2',
      '7',
    ]);
  });

  it('allows open-ended bounds', () => {
    expect(ids(search(ledger, { strategy: 'range', field: 'amount', min: 100 }))).toEqual(['8']);
    expect(search(ledger, { strategy: 'range', field: 'amount' })).toHaveLength(7);
  });

  it('filters dates', () => {
    expect(
      ids(
        search(ledger, {
          strategy: 'range',
          field: 'transactionDate',
          min: '2024-01-01',
          max: '2024-01-31',
        })
      )
    ).toEqual(['1', '2']);
  });

  it('rejects inverted and malformed bounds', () => {
    expect(() => search(ledger, { strategy: 'range', field: 'amount', min: 30, max: 10 })).toThrow(
      expect.objectContaining({ parameter: 'min' })
    );
    expect(() =>
      search(ledger, { strategy: 'range', field: 'transactionDate', max: 'yesterday' })
    ).toThrow(expect.objectContaining({ parameter: 'max' }));
  });

  it('rejects fields without an order', () => {
    expect(() =>
      search(ledger, { strategy: 'range', field: 'vendor' as unknown as RangeField, min: 'a' })
    ).toThrow('Field "vendor" is not supported by the range strategy');
  });
});

describe('search', () => {
  it('rejects an unknown strategy', () => {
    const query = { strategy: 'semantic', keyword: 'coffee' } as unknown as SearchQuery;

    expect(() => search(ledger, query)).toThrow(
      new InvalidQueryError('Unknown search strategy "semantic"', 'strategy')
    );
  });

  it('returns nothing for an empty collection', () => {
    const queries: SearchQuery[] = [
      { strategy: 'linear', fields: 'vendor', keyword: 'cafe' },
      { strategy: 'binary', field: 'amount', value: 10 },
      { strategy: 'hash', field: 'vendor', value: 'cafe' },
      { strategy: 'fuzzy', field: 'vendor', keyword: 'cafe' },
      { strategy: 'pattern', field: 'vendor', pattern: 'cafe' },
      { strategy: 'range', field: 'amount', min: 1 },
    ];

    for (const query of queries) {
      expect(search([], query)).toEqual([]);
    }
  });

  it('does not modify the input', () => {
    const before = ids(ledger);
    search(ledger, { strategy: 'binary', field: 'amount', value: 20 });

    expect(ids(ledger)).toEqual(before);
  });

  it('exposes a frozen strategy table', () => {
    expect(Object.keys(SEARCH_STRATEGIES)).toEqual([
      'linear',
      'binary',
      'hash',
      'fuzzy',
      'pattern',
      'range',
    ]);
    expect(Object.isFrozen(SEARCH_STRATEGIES)).toBe(true);
    expect(SEARCH_STRATEGIES.range.supportedFields).toEqual(['amount', 'transactionDate']);
  });
});

describe('searchAll', () => {
  it('combines queries with logical AND', () => {
    const results = searchAll(ledger, [
      { strategy: 'linear', fields: 'vendor', keyword: 'walmart' },
      { strategy: 'range', field: 'amount', max: 30 },
    ]);

    expect(ids(results)).toEqual(['4']);
  });

  it('returns a copy of everything for no queries', () => {
    const results = searchAll(ledger, []);

    expect(results).toEqual(ledger);
    expect(results).not.toBe(ledger);
  });
});
