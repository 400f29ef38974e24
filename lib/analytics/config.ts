/**
 * Analytics defaults. Read-only after load.
 */

import { deepFreeze } from '@/lib/utils';
import type { SortAlgorithm } from '@/types/analytics';

export interface AnalyticsConfig {
  /** Sort used by binary search, median and the façade when none is named */
  defaultSortAlgorithm: SortAlgorithm;

  /** Buckets per sliding-window average */
  defaultWindowSize: number;

  /** Longest regular expression the pattern strategy will compile */
  maxPatternLength: number;

  /** Flags applied when a pattern query names none */
  defaultPatternFlags: string;

  /** Upper bound of the length-derived fuzzy threshold */
  maxFuzzyDistance: number;
}

export const DEFAULT_ANALYTICS_CONFIG: Readonly<AnalyticsConfig> = deepFreeze({
  defaultSortAlgorithm: 'mergesort',
  defaultWindowSize: 3,
  maxPatternLength: 256,
  defaultPatternFlags: 'i',
  maxFuzzyDistance: 3,
});
