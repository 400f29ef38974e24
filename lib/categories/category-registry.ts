/**
 * Category Registry - Single Source of Truth for receipt-ledger
 *
 * Every system that needs category information derives from this file:
 *   - Category extractor (keyword table + tie-break priority)
 *   - Record editor (allowed values)
 *   - Display labels for callers presenting records
 *
 * The keyword table lives in `category-keywords.json` and is validated
 * once when this module loads. Extractors receive it through their
 * config, so tests can swap in a different table.
 */

import { z } from 'zod';

import { ReceiptLedgerError } from '@/lib/errors';
import { deepFreeze } from '@/lib/utils';
import { RECEIPT_CATEGORIES } from '@/types/receipt';
import type { ReceiptCategory } from '@/types/receipt';

import categoryKeywords from './category-keywords.json';

// ============================================
// Types
// ============================================

/**
 * Lowercased keywords per category. Keywords are matched on word
 * boundaries, so "shell" does not fire on "seashell".
 */
export type CategoryKeywordTable = Readonly<
  Record<ReceiptCategory, readonly string[]>
>;

export interface CategoryDefinition {
  slug: ReceiptCategory;

  /** Display name */
  label: string;

  /** What belongs in the category */
  description: string;
}

// ============================================
// The Registry
// ============================================

export const CATEGORY_REGISTRY: readonly CategoryDefinition[] = deepFreeze<
  CategoryDefinition[]
>([
  {
    slug: 'groceries',
    label: 'Groceries',
    description: 'Supermarkets, grocery stores and food staples',
  },
  {
    slug: 'restaurant',
    label: 'Restaurant',
    description: 'Restaurants, cafes, fast food and coffee shops',
  },
  {
    slug: 'transport',
    label: 'Transport',
    description: 'Fuel, ride hailing, taxis, parking and transit',
  },
  {
    slug: 'entertainment',
    label: 'Entertainment',
    description: 'Movies, streaming, concerts and events',
  },
  {
    slug: 'shopping',
    label: 'Shopping',
    description: 'Retail, clothing, electronics and online stores',
  },
  {
    slug: 'utilities',
    label: 'Utilities',
    description: 'Electricity, water, internet and phone bills',
  },
  {
    slug: 'healthcare',
    label: 'Healthcare',
    description: 'Pharmacies, clinics, doctors and hospitals',
  },
  {
    slug: 'other',
    label: 'Other',
    description: 'Anything the keyword table does not cover',
  },
]);

/**
 * Tie-break order for the category classifier (earlier wins).
 */
export const CATEGORY_PRIORITY: readonly ReceiptCategory[] = RECEIPT_CATEGORIES;

// ============================================
// Keyword Table
// ============================================

const keywordListSchema = z.array(z.string().trim().toLowerCase().min(1));

const categoryKeywordTableSchema = z
  .object({
    groceries: keywordListSchema,
    restaurant: keywordListSchema,
    transport: keywordListSchema,
    entertainment: keywordListSchema,
    shopping: keywordListSchema,
    utilities: keywordListSchema,
    healthcare: keywordListSchema,
    other: keywordListSchema,
  })
  .strict();

/**
 * Validate a keyword table (e.g. loaded from JSON) and return a frozen copy.
 */
export function parseCategoryKeywordTable(input: unknown): CategoryKeywordTable {
  const result = categoryKeywordTableSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue ? issue.path.join('.') : '';
    throw new ReceiptLedgerError(
      `Invalid category keyword table${path ? ` at "${path}"` : ''}: ${issue?.message ?? 'unknown issue'}`,
      'CONFIG_ERROR',
      false
    );
  }
  return deepFreeze(result.data);
}

/**
 * The bundled keyword table.
 */
export const DEFAULT_CATEGORY_KEYWORDS: CategoryKeywordTable =
  parseCategoryKeywordTable(categoryKeywords);

// ============================================
// Lookup Functions
// ============================================

const _slugMap = new Map<ReceiptCategory, CategoryDefinition>();
for (const cat of CATEGORY_REGISTRY) {
  _slugMap.set(cat.slug, cat);
}

/**
 * Get the display label for a category.
 */
export function getCategoryLabel(category: ReceiptCategory): string {
  return _slugMap.get(category)?.label ?? category;
}

/**
 * Get a category definition by slug.
 */
export function getCategoryDefinition(
  category: ReceiptCategory
): CategoryDefinition | undefined {
  return _slugMap.get(category);
}
