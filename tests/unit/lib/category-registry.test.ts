/**
 * Unit Tests for the Category Registry
 */

import { describe, it, expect } from 'vitest';
import {
  CATEGORY_PRIORITY,
  CATEGORY_REGISTRY,
  DEFAULT_CATEGORY_KEYWORDS,
  getCategoryDefinition,
  getCategoryLabel,
  parseCategoryKeywordTable,
} from '@/lib/categories/category-registry';
import { ReceiptLedgerError } from '@/lib/errors';
import { RECEIPT_CATEGORIES } from '@/types/receipt';

describe('CATEGORY_REGISTRY', () => {
  it('defines every category once, in priority order', () => {
    expect(CATEGORY_REGISTRY.map((category) => category.slug)).toEqual([...RECEIPT_CATEGORIES]);
    expect(CATEGORY_PRIORITY[0]).toBe('groceries');
  });

  it('looks up labels and definitions', () => {
    expect(getCategoryLabel('healthcare')).toBe('Healthcare');
    expect(getCategoryDefinition('transport')?.description).toBe(
      'Fuel, ride hailing, taxis, parking and transit'
    );
  });
});

describe('parseCategoryKeywordTable', () => {
  const emptyTable = {
    groceries: [],
    restaurant: [],
    transport: [],
    entertainment: [],
    shopping: [],
    utilities: [],
    healthcare: [],
    other: [],
  };

  it('lowercases and trims keywords', () => {
    const table = parseCategoryKeywordTable({ ...emptyTable, groceries: ['  Kale ', 'MILK'] });

    expect(table.groceries).toEqual(['kale', 'milk']);
    expect(Object.isFrozen(table.groceries)).toBe(true);
  });

  it('rejects a table with a missing or unknown category', () => {
    const missing: Record<string, string[]> = { ...emptyTable };
    delete missing.other;

    expect(() => parseCategoryKeywordTable(missing)).toThrow(ReceiptLedgerError);
    expect(() => parseCategoryKeywordTable({ ...emptyTable, travel: ['flight'] })).toThrow(
      /Invalid category keyword table/
    );
  });

  it('rejects blank keywords', () => {
    expect(() => parseCategoryKeywordTable({ ...emptyTable, other: ['  '] })).toThrow(
      'Invalid category keyword table at "other.0"'
    );
  });

  it('loads the bundled table', () => {
    expect(DEFAULT_CATEGORY_KEYWORDS.transport).toContain('shell');
    expect(DEFAULT_CATEGORY_KEYWORDS.groceries).toContain('walmart');
  });
});
