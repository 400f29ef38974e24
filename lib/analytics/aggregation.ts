/**
 * Aggregation Engine
 *
 * Descriptive statistics, frequency tables, calendar time series and a
 * trailing moving average over a series. Money is summed in integer
 * cents and every reported amount is rounded to cents.
 *
 * Empty input never fails: counts are zero and the remaining
 * statistics are null.
 */

import { getISOWeek, getISOWeekYear, parseISO } from 'date-fns';

import { InvalidQueryError } from '@/lib/errors';
import { isDefined, roundCurrency, toCents } from '@/lib/utils';
import type { ReceiptRecord } from '@/types/receipt';
import type {
  AggregationOptions,
  AggregationReport,
  FrequencyEntry,
  FrequencyKey,
  SlidingWindowPoint,
  Statistics,
  TimeBucket,
  TimeInterval,
  TimeSeries,
} from '@/types/analytics';

import { DEFAULT_ANALYTICS_CONFIG } from './config';
import { sortRecords } from './sort';

// ============================================
// Helpers
// ============================================

const TIME_INTERVALS: ReadonlySet<string> = new Set(['day', 'week', 'month', 'year']);

function assertPositiveInteger(value: number, parameter: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidQueryError(`${parameter} must be a positive integer, got ${value}`, parameter);
  }
}

function compareText(a: string, b: string): number {
  return a === b ? 0 : a < b ? -1 : 1;
}

// ============================================
// Descriptive Statistics
// ============================================

/**
 * Statistics over the records' amounts. Records without an amount are
 * left out of every figure.
 *
 * Mode is the most frequent cent value (smallest on ties) and is null
 * when no value repeats. Variance and standard deviation use the sample
 * (n - 1) formula and are null below two values.
 */
export function computeStatistics(records: readonly ReceiptRecord[]): Statistics {
  const priced = records.filter((record) => record.amount !== null);
  const amounts = sortRecords(priced, 'amount', 'mergesort', 'asc')
    .map((record) => record.amount)
    .filter(isDefined);

  const count = amounts.length;
  if (count === 0) {
    return {
      count: 0,
      sum: 0,
      mean: null,
      median: null,
      mode: null,
      stdev: null,
      variance: null,
      min: null,
      max: null,
    };
  }

  const cents = amounts.map(toCents);
  const sumCents = cents.reduce((total, value) => total + value, 0);
  const mean = sumCents / count / 100;

  const middle = Math.floor(count / 2);
  const median =
    count % 2 === 1
      ? (cents[middle] ?? 0) / 100
      : ((cents[middle - 1] ?? 0) + (cents[middle] ?? 0)) / 200;

  let variance: number | null = null;
  if (count > 1) {
    const squares = amounts.reduce((total, value) => total + (value - mean) ** 2, 0);
    variance = squares / (count - 1);
  }

  return {
    count,
    sum: sumCents / 100,
    mean: roundCurrency(mean),
    median: roundCurrency(median),
    mode: computeMode(cents),
    stdev: variance === null ? null : roundCurrency(Math.sqrt(variance)),
    variance: variance === null ? null : roundCurrency(variance),
    min: (cents[0] ?? 0) / 100,
    max: (cents[count - 1] ?? 0) / 100,
  };
}

/**
 * Most frequent value among ascending cent values.
 */
function computeMode(sortedCents: readonly number[]): number | null {
  let bestValue: number | null = null;
  let bestCount = 1;
  let runValue: number | null = null;
  let runCount = 0;

  for (const value of sortedCents) {
    if (value === runValue) {
      runCount++;
    } else {
      runValue = value;
      runCount = 1;
    }
    // Strictly greater keeps the smallest value on ties
    if (runCount > bestCount) {
      bestCount = runCount;
      bestValue = runValue;
    }
  }

  return bestValue === null ? null : bestValue / 100;
}

// ============================================
// Frequency Tables
// ============================================

/**
 * Occurrence count and summed amount per vendor or category, by
 * descending count, then key. Records without a vendor are skipped.
 */
export function frequencyTable(
  records: readonly ReceiptRecord[],
  key: FrequencyKey,
  options: { limit?: number } = {}
): FrequencyEntry[] {
  if (key !== 'vendor' && key !== 'category') {
    throw new InvalidQueryError(`Cannot build a frequency table over "${String(key)}"`, 'key');
  }
  if (options.limit !== undefined) {
    assertPositiveInteger(options.limit, 'limit');
  }

  const groups = new Map<string, { count: number; cents: number }>();
  for (const record of records) {
    const value = key === 'vendor' ? record.vendor : record.category;
    if (value === null) {
      continue;
    }
    const group = groups.get(value) ?? { count: 0, cents: 0 };
    group.count++;
    group.cents += record.amount === null ? 0 : toCents(record.amount);
    groups.set(value, group);
  }

  const entries = Array.from(groups, ([groupKey, { count, cents }]) => ({
    key: groupKey,
    count,
    totalAmount: cents / 100,
  })).sort((a, b) => b.count - a.count || compareText(a.key, b.key));

  return options.limit === undefined ? entries : entries.slice(0, options.limit);
}

// ============================================
// Time Series
// ============================================

/**
 * Bucket label for an ISO date.
 */
export function periodOf(isoDate: string, interval: TimeInterval): string {
  switch (interval) {
    case 'day':
      return isoDate;
    case 'week': {
      const date = parseISO(isoDate);
      return `${getISOWeekYear(date)}-W${String(getISOWeek(date)).padStart(2, '0')}`;
    }
    case 'month':
      return isoDate.slice(0, 7);
    case 'year':
      return isoDate.slice(0, 4);
  }
}

/**
 * Sum amounts per calendar bucket. Only buckets with at least one
 * record appear. Records without a date are counted as `undated`;
 * dated records without an amount count towards their bucket and add 0.
 */
export function timeSeries(records: readonly ReceiptRecord[], interval: TimeInterval): TimeSeries {
  if (!TIME_INTERVALS.has(interval)) {
    throw new InvalidQueryError(`Unknown time interval "${String(interval)}"`, 'interval');
  }

  const buckets = new Map<string, { count: number; cents: number }>();
  let undated = 0;

  for (const record of records) {
    if (record.transactionDate === null) {
      undated++;
      continue;
    }
    const period = periodOf(record.transactionDate, interval);
    const bucket = buckets.get(period) ?? { count: 0, cents: 0 };
    bucket.count++;
    bucket.cents += record.amount === null ? 0 : toCents(record.amount);
    buckets.set(period, bucket);
  }

  // Labels are zero-padded, so text order is chronological
  const ordered: TimeBucket[] = Array.from(buckets, ([period, { count, cents }]) => ({
    period,
    total: cents / 100,
    count,
  })).sort((a, b) => compareText(a.period, b.period));

  return { interval, buckets: ordered, undated };
}

/**
 * Trailing moving average of bucket totals. Near the start of the
 * series the window is truncated: the first point averages one bucket,
 * the second two, and so on up to `windowSize`.
 */
export function slidingWindowAverage(
  series: TimeSeries | readonly TimeBucket[],
  windowSize: number = DEFAULT_ANALYTICS_CONFIG.defaultWindowSize
): SlidingWindowPoint[] {
  assertPositiveInteger(windowSize, 'windowSize');
  const buckets = 'buckets' in series ? series.buckets : series;

  return buckets.map((bucket, index) => {
    const window = buckets.slice(Math.max(0, index - windowSize + 1), index + 1);
    const cents = window.reduce((total, entry) => total + toCents(entry.total), 0);
    return {
      period: bucket.period,
      average: roundCurrency(cents / window.length / 100),
      bucketCount: window.length,
    };
  });
}

// ============================================
// Full Report
// ============================================

/**
 * Everything at once: statistics, vendor and category frequencies,
 * monthly and yearly series and the monthly moving average.
 */
export function aggregate(
  records: readonly ReceiptRecord[],
  options: AggregationOptions = {}
): AggregationReport {
  const windowSize = options.windowSize ?? DEFAULT_ANALYTICS_CONFIG.defaultWindowSize;
  assertPositiveInteger(windowSize, 'windowSize');

  const monthly = timeSeries(records, 'month');

  return {
    statistics: computeStatistics(records),
    vendorFrequency: frequencyTable(records, 'vendor', { limit: options.vendorLimit }),
    categoryFrequency: frequencyTable(records, 'category'),
    monthly,
    yearly: timeSeries(records, 'year'),
    slidingWindow: slidingWindowAverage(monthly, windowSize),
  };
}
