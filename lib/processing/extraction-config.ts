/**
 * Extraction Configuration for receipt-ledger
 *
 * All heuristic tables used by the field extractors: date patterns,
 * total/subtotal keywords, vendor scan parameters and the category
 * keyword table. The default config is built once and frozen; callers
 * that need different tables build their own with
 * `createExtractionConfig()` and hand it to the extractors.
 */

import {
  CATEGORY_PRIORITY,
  DEFAULT_CATEGORY_KEYWORDS,
  parseCategoryKeywordTable,
} from '@/lib/categories/category-registry';
import type { CategoryKeywordTable } from '@/lib/categories/category-registry';
import { deepFreeze } from '@/lib/utils';
import type { ReceiptCategory } from '@/types/receipt';

// ============================================
// Types
// ============================================

export interface DateParts {
  year: number;
  month: number;
  day: number;
}

/**
 * Date pattern configuration with metadata.
 * `regex` must carry the `g` flag; extractors scan it with `matchAll`,
 * which works on a copy and leaves the shared instance untouched.
 */
export interface DatePattern {
  regex: RegExp;
  format: string;
  baseConfidence: number;
  parser: (match: RegExpMatchArray) => DateParts | null;
}

export interface VendorExtractionConfig {
  /** How many normalized lines from the top are considered */
  headerLineCount: number;
  minLength: number;
  maxLength: number;
  /** Maximum share of digits/symbols among non-space characters */
  maxSymbolRatio: number;
  /** Lines containing any of these words are never vendor names */
  excludedWords: readonly string[];
  /** Words that make a line look like a store name */
  storeSuffixes: readonly string[];
  /** Explicit "Merchant: X" style labels */
  labelPrefixes: readonly string[];
}

export interface DateExtractionConfig {
  /** Tried in order; the first valid match wins */
  patterns: readonly DatePattern[];
  /** Keywords on the same line that boost confidence */
  contextKeywords: readonly string[];
  minYear: number;
  maxYear: number;
}

export interface AmountExtractionConfig {
  /** Unambiguous total labels */
  strongTotalKeywords: readonly string[];
  /** Plain total labels */
  totalKeywords: readonly string[];
  /** Labels that look like totals but are not */
  subtotalKeywords: readonly string[];
}

export interface CategoryExtractionConfig {
  keywords: CategoryKeywordTable;
  /** Tie-break order (earlier wins) */
  priority: readonly ReceiptCategory[];
}

export interface ExtractionConfig {
  vendor: VendorExtractionConfig;
  date: DateExtractionConfig;
  amount: AmountExtractionConfig;
  category: CategoryExtractionConfig;
}

export type ExtractionConfigOverrides = {
  [K in keyof ExtractionConfig]?: Partial<ExtractionConfig[K]>;
};

// ============================================
// Constants - Date Patterns
// ============================================

/**
 * Month name to number mapping.
 */
const MONTH_MAP: Record<string, number> = {
  jan: 1,
  january: 1,
  feb: 2,
  february: 2,
  mar: 3,
  march: 3,
  apr: 4,
  april: 4,
  may: 5,
  jun: 6,
  june: 6,
  jul: 7,
  july: 7,
  aug: 8,
  august: 8,
  sep: 9,
  sept: 9,
  september: 9,
  oct: 10,
  october: 10,
  nov: 11,
  november: 11,
  dec: 12,
  december: 12,
};

const MONTH_NAME =
  '(Jan(?:uary)?|Feb(?:ruary)?|Mar(?:ch)?|Apr(?:il)?|May|June?|July?|Aug(?:ust)?|Sep(?:t(?:ember)?)?|Oct(?:ober)?|Nov(?:ember)?|Dec(?:ember)?)';

function toInt(value: string | undefined): number {
  return parseInt(value ?? '', 10);
}

function monthFromName(name: string | undefined): number | null {
  return MONTH_MAP[(name ?? '').toLowerCase()] ?? null;
}

/**
 * Date patterns in order of specificity with parsers.
 */
export const DEFAULT_DATE_PATTERNS: readonly DatePattern[] = [
  // ISO format: 2024-01-15 or 2024/01/15
  {
    regex: /\b(\d{4})[-/](\d{1,2})[-/](\d{1,2})\b/g,
    format: 'YYYY-MM-DD',
    baseConfidence: 0.95,
    parser: (m) => ({ year: toInt(m[1]), month: toInt(m[2]), day: toInt(m[3]) }),
  },
  // Written format: January 15, 2024 or Jan 15 2024
  {
    regex: new RegExp(
      `\\b${MONTH_NAME}\\.?\\s+(\\d{1,2})(?:st|nd|rd|th)?,?\\s+(\\d{4})\\b`,
      'gi'
    ),
    format: 'Month DD, YYYY',
    baseConfidence: 0.9,
    parser: (m) => {
      const month = monthFromName(m[1]);
      if (month === null) {
        return null;
      }
      return { year: toInt(m[3]), month, day: toInt(m[2]) };
    },
  },
  // Compact written: 15 Jan 2024 or 15-Jan-2024
  {
    regex: new RegExp(
      `\\b(\\d{1,2})(?:st|nd|rd|th)?[\\s-]${MONTH_NAME}\\.?[\\s,-]+(\\d{4})\\b`,
      'gi'
    ),
    format: 'DD Month YYYY',
    baseConfidence: 0.88,
    parser: (m) => {
      const month = monthFromName(m[2]);
      if (month === null) {
        return null;
      }
      return { year: toInt(m[3]), month, day: toInt(m[1]) };
    },
  },
  // US numeric: 01/15/2024
  {
    regex: /\b(\d{1,2})\/(\d{1,2})\/(\d{4})\b/g,
    format: 'MM/DD/YYYY',
    baseConfidence: 0.85,
    parser: (m) => ({ year: toInt(m[3]), month: toInt(m[1]), day: toInt(m[2]) }),
  },
  // US numeric with dashes or dots: 01-15-2024, 01.15.2024
  {
    regex: /\b(\d{1,2})[-.](\d{1,2})[-.](\d{4})\b/g,
    format: 'MM-DD-YYYY',
    baseConfidence: 0.8,
    parser: (m) => ({ year: toInt(m[3]), month: toInt(m[1]), day: toInt(m[2]) }),
  },
  // Day-first fallback, only reached when the US reading was impossible: 15/01/2024
  {
    regex: /\b(\d{1,2})[-/.](\d{1,2})[-/.](\d{4})\b/g,
    format: 'DD/MM/YYYY',
    baseConfidence: 0.7,
    parser: (m) => ({ year: toInt(m[3]), month: toInt(m[2]), day: toInt(m[1]) }),
  },
  // Two-digit year: 01/15/24 (ambiguous century)
  {
    regex: /\b(\d{1,2})\/(\d{1,2})\/(\d{2})\b/g,
    format: 'MM/DD/YY',
    baseConfidence: 0.6,
    parser: (m) => ({
      year: 2000 + toInt(m[3]),
      month: toInt(m[1]),
      day: toInt(m[2]),
    }),
  },
];

/**
 * Context keywords that boost date confidence.
 */
const DATE_CONTEXT_KEYWORDS = [
  'date',
  'invoice date',
  'transaction date',
  'purchase date',
  'order date',
  'issued',
];

// ============================================
// Default Config
// ============================================

export const DEFAULT_EXTRACTION_CONFIG: ExtractionConfig = deepFreeze({
  vendor: {
    headerLineCount: 5,
    minLength: 3,
    maxLength: 50,
    maxSymbolRatio: 0.25,
    excludedWords: [
      'receipt',
      'invoice',
      'total',
      'subtotal',
      'amount',
      'date',
      'time',
      'tax',
      'thank you',
      'description',
      'price',
      'qty',
      'cashier',
      'change',
      'cash',
      'visa',
      'mastercard',
      'card',
      'tel',
      'phone',
      'www',
      'welcome',
      'order',
      'bill',
    ],
    storeSuffixes: [
      'store',
      'market',
      'shop',
      'supermarket',
      'grocery',
      'restaurant',
      'cafe',
      'mall',
      'pharmacy',
      'inc',
      'llc',
    ],
    labelPrefixes: ['merchant', 'vendor', 'store', 'seller', 'payee'],
  },
  date: {
    patterns: DEFAULT_DATE_PATTERNS,
    contextKeywords: DATE_CONTEXT_KEYWORDS,
    minYear: 1900,
    maxYear: 2100,
  },
  amount: {
    strongTotalKeywords: [
      'grand total',
      'amount due',
      'balance due',
      'total due',
      'amount paid',
    ],
    totalKeywords: ['total', 'balance'],
    subtotalKeywords: ['subtotal', 'sub total', 'sub-total'],
  },
  category: {
    keywords: DEFAULT_CATEGORY_KEYWORDS,
    priority: CATEGORY_PRIORITY,
  },
});

/**
 * Build a frozen config from the defaults plus per-section overrides.
 * A replacement keyword table is validated before use.
 */
export function createExtractionConfig(
  overrides: ExtractionConfigOverrides = {}
): ExtractionConfig {
  const categoryOverrides = overrides.category ?? {};

  return deepFreeze({
    vendor: { ...DEFAULT_EXTRACTION_CONFIG.vendor, ...overrides.vendor },
    date: { ...DEFAULT_EXTRACTION_CONFIG.date, ...overrides.date },
    amount: { ...DEFAULT_EXTRACTION_CONFIG.amount, ...overrides.amount },
    category: {
      ...DEFAULT_EXTRACTION_CONFIG.category,
      ...categoryOverrides,
      keywords: categoryOverrides.keywords
        ? parseCategoryKeywordTable(categoryOverrides.keywords)
        : DEFAULT_EXTRACTION_CONFIG.category.keywords,
    },
  });
}
