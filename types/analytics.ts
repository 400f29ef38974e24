/**
 * Analytics Types for receipt-ledger
 *
 * Query and result shapes shared by the search strategies, the sort
 * strategies, the aggregation engine and the analytics façade.
 */

import type { ReceiptRecord } from './receipt';

// ============================================
// Fields
// ============================================

/** Every record field a query may name */
export const RECORD_FIELDS = [
  'vendor',
  'category',
  'rawText',
  'transactionDate',
  'amount',
  'createdAt',
  'overallConfidence',
] as const;

export type RecordField = (typeof RECORD_FIELDS)[number];

/** Free-text fields (keyword, fuzzy and pattern search) */
export const TEXT_FIELDS = ['vendor', 'category', 'rawText'] as const;
export type TextField = (typeof TEXT_FIELDS)[number];

/** Fields with a scalar key usable for equality lookups */
export const KEY_FIELDS = ['vendor', 'category', 'transactionDate', 'amount'] as const;
export type KeyField = (typeof KEY_FIELDS)[number];

/** Fields with an ordered numeric or temporal domain */
export const RANGE_FIELDS = ['amount', 'transactionDate'] as const;
export type RangeField = (typeof RANGE_FIELDS)[number];

/** Fields with a defined sort comparator */
export const SORT_FIELDS = [
  'vendor',
  'category',
  'transactionDate',
  'amount',
  'createdAt',
  'overallConfidence',
] as const;
export type SortField = (typeof SORT_FIELDS)[number];

// ============================================
// Search
// ============================================

export const SEARCH_STRATEGY_NAMES = [
  'linear',
  'binary',
  'hash',
  'fuzzy',
  'pattern',
  'range',
] as const;

export type SearchStrategyName = (typeof SEARCH_STRATEGY_NAMES)[number];

export interface LinearSearchQuery {
  strategy: 'linear';
  fields: TextField | TextField[];
  keyword: string;
  /** substring (default) or whole-value equality, both case-insensitive */
  match?: 'substring' | 'exact';
}

export interface BinarySearchQuery {
  strategy: 'binary';
  field: KeyField;
  value: string | number;
  mode?: 'exact' | 'prefix';
  /** Skip the sort step when the caller already ordered the records ascending on `field` */
  presorted?: boolean;
  /** Sort strategy used to order the records first */
  algorithm?: SortAlgorithm;
}

export interface HashSearchQuery {
  strategy: 'hash';
  field: KeyField;
  value: string | number;
}

export interface FuzzySearchQuery {
  strategy: 'fuzzy';
  field: TextField;
  keyword: string;
  /** Override for the length-derived edit distance threshold */
  maxDistance?: number;
}

export interface PatternSearchQuery {
  strategy: 'pattern';
  field: TextField;
  pattern: string;
  flags?: string;
}

export interface RangeSearchQuery {
  strategy: 'range';
  field: RangeField;
  /** Inclusive lower bound: a number for amount, YYYY-MM-DD for transactionDate */
  min?: number | string;
  /** Inclusive upper bound */
  max?: number | string;
}

export type SearchQuery =
  | LinearSearchQuery
  | BinarySearchQuery
  | HashSearchQuery
  | FuzzySearchQuery
  | PatternSearchQuery
  | RangeSearchQuery;

export type SearchQueryFor<N extends SearchStrategyName> = Extract<
  SearchQuery,
  { strategy: N }
>;

/**
 * Uniform contract every search strategy implements.
 */
export interface SearchStrategy<Q extends SearchQuery> {
  readonly name: Q['strategy'];
  readonly supportedFields: readonly RecordField[];
  search(records: readonly ReceiptRecord[], query: Q): ReceiptRecord[];
}

// ============================================
// Sort
// ============================================

export const SORT_ALGORITHMS = [
  'quicksort',
  'mergesort',
  'heapsort',
  'adaptive',
] as const;

export type SortAlgorithm = (typeof SORT_ALGORITHMS)[number];

export type SortDirection = 'asc' | 'desc';

export interface SortStrategy {
  readonly name: SortAlgorithm;
  /** Whether the algorithm alone is stable (the shared comparator makes every result deterministic) */
  readonly stable: boolean;
  readonly complexity: {
    average: string;
    worst: string;
  };
  sort(
    records: readonly ReceiptRecord[],
    field: SortField,
    direction: SortDirection
  ): ReceiptRecord[];
}

export interface SortSpec {
  field: SortField;
  algorithm?: SortAlgorithm;
  direction?: SortDirection;
}

// ============================================
// Aggregation
// ============================================

export interface Statistics {
  count: number;
  sum: number;
  mean: number | null;
  median: number | null;
  mode: number | null;
  stdev: number | null;
  variance: number | null;
  min: number | null;
  max: number | null;
}

export type FrequencyKey = 'vendor' | 'category';

export interface FrequencyEntry {
  key: string;
  count: number;
  totalAmount: number;
}

export type TimeInterval = 'day' | 'week' | 'month' | 'year';

export interface TimeBucket {
  /** Bucket label: YYYY-MM-DD, YYYY-Www, YYYY-MM or YYYY */
  period: string;
  total: number;
  count: number;
}

export interface TimeSeries {
  interval: TimeInterval;
  /** Chronological */
  buckets: TimeBucket[];
  /** Records without a transaction date */
  undated: number;
}

export interface SlidingWindowPoint {
  period: string;
  average: number;
  /** Buckets actually averaged (fewer than the window at the series start) */
  bucketCount: number;
}

export interface AggregationOptions {
  windowSize?: number;
  vendorLimit?: number;
}

export interface AggregationReport {
  statistics: Statistics;
  vendorFrequency: FrequencyEntry[];
  categoryFrequency: FrequencyEntry[];
  monthly: TimeSeries;
  yearly: TimeSeries;
  slidingWindow: SlidingWindowPoint[];
}

// ============================================
// Façade
// ============================================

export interface AnalyticsQuery {
  /** One strategy, or several combined with logical AND */
  search?: SearchQuery | SearchQuery[];
  sort?: SortSpec;
  aggregate?: boolean | AggregationOptions;
}

export interface AnalyticsResult {
  records: ReceiptRecord[];
  total: number;
  aggregation: AggregationReport | null;
}
