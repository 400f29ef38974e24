/**
 * Analytics Module - Barrel Export
 *
 * Search and sort strategies, aggregation and the query façade.
 */

// ============================================
// Search
// ============================================

export {
  SEARCH_STRATEGIES,
  search,
  searchAll,
  buildHashIndex,
  compilePattern,
  fuzzyThreshold,
  type SearchStrategyTable,
} from './search';

// ============================================
// Sort
// ============================================

export { SORT_STRATEGIES, sortRecords, isSortAlgorithm } from './sort';

// ============================================
// Aggregation
// ============================================

export {
  aggregate,
  computeStatistics,
  frequencyTable,
  timeSeries,
  slidingWindowAverage,
  periodOf,
} from './aggregation';

// ============================================
// Façade
// ============================================

export {
  AnalyticsFacade,
  analyticsFacade,
  analyticsQuerySchema,
  query,
  safeQuery,
  type SafeQueryResult,
} from './analytics-facade';

export { DEFAULT_ANALYTICS_CONFIG, type AnalyticsConfig } from './config';
export { levenshteinDistance, type FieldKey } from './utils';
