/**
 * receipt-ledger Type Definitions
 *
 * Usage:
 * ```typescript
 * import type { ReceiptRecord, SearchQuery } from '@/types';
 * ```
 */

// ============================================
// Receipt Types
// ============================================

export type {
  ReceiptId,
  ReceiptCategory,
  ExtractedFieldName,
  FieldConfidence,
  RecordSource,
  ReceiptRecord,
  ReceiptPatch,
} from './receipt';

export {
  RECEIPT_CATEGORIES,
  createReceiptId,
  isReceiptCategory,
} from './receipt';

// ============================================
// Analytics Types
// ============================================

export type {
  RecordField,
  TextField,
  KeyField,
  RangeField,
  SortField,
  SearchStrategyName,
  LinearSearchQuery,
  BinarySearchQuery,
  HashSearchQuery,
  FuzzySearchQuery,
  PatternSearchQuery,
  RangeSearchQuery,
  SearchQuery,
  SearchQueryFor,
  SearchStrategy,
  SortAlgorithm,
  SortDirection,
  SortStrategy,
  SortSpec,
  Statistics,
  FrequencyKey,
  FrequencyEntry,
  TimeInterval,
  TimeBucket,
  TimeSeries,
  SlidingWindowPoint,
  AggregationOptions,
  AggregationReport,
  AnalyticsQuery,
  AnalyticsResult,
} from './analytics';

export {
  RECORD_FIELDS,
  TEXT_FIELDS,
  KEY_FIELDS,
  RANGE_FIELDS,
  SORT_FIELDS,
  SEARCH_STRATEGY_NAMES,
  SORT_ALGORITHMS,
} from './analytics';
