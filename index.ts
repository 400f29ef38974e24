/**
 * receipt-ledger
 *
 * Receipt field extraction and analytics over the extracted records.
 *
 * ```typescript
 * import { extract, query } from 'receipt-ledger';
 *
 * const record = extract('WALMART\n01/15/2024\nTOTAL $45.67');
 * const { records, aggregation } = query([record], {
 *   search: { strategy: 'range', field: 'amount', min: 10, max: 50 },
 *   sort: { field: 'transactionDate', direction: 'desc' },
 *   aggregate: true,
 * });
 * ```
 */

// ============================================
// Extraction
// ============================================

export {
  extract,
  ReceiptExtractor,
  receiptExtractor,
  createExtractorSet,
  normalizeText,
  VendorExtractor,
  DateExtractor,
  AmountExtractor,
  CategoryExtractor,
  DEFAULT_EXTRACTION_CONFIG,
  createExtractionConfig,
  applyReceiptPatch,
  assertRecordInvariants,
  type ExtractionConfig,
  type ExtractionConfigOverrides,
  type FieldExtraction,
  type FieldExtractor,
  type ReceiptExtractorOptions,
  type ReceiptExtractorSet,
} from './lib/processing';

// ============================================
// Analytics
// ============================================

export {
  search,
  searchAll,
  buildHashIndex,
  sortRecords as sort,
  aggregate,
  computeStatistics,
  frequencyTable,
  timeSeries,
  slidingWindowAverage,
  query,
  safeQuery,
  AnalyticsFacade,
  analyticsFacade,
  SEARCH_STRATEGIES,
  SORT_STRATEGIES,
  DEFAULT_ANALYTICS_CONFIG,
  type SafeQueryResult,
} from './lib/analytics';

// ============================================
// Export
// ============================================

export { exportRecords, type ExportFormat, type ExportResult } from './lib/export';

// ============================================
// Categories & Errors
// ============================================

export {
  CATEGORY_REGISTRY,
  getCategoryLabel,
  getCategoryDefinition,
  parseCategoryKeywordTable,
} from './lib/categories/category-registry';

export {
  ReceiptLedgerError,
  QueryError,
  PatternError,
  UnsupportedFieldError,
  InvalidQueryError,
  InvariantViolationError,
  handleError,
} from './lib/errors';

export * from './types';
