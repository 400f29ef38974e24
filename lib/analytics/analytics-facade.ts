/**
 * Analytics Façade for receipt-ledger
 *
 * One entry point for search → sort → aggregate over a record
 * collection. The whole query is validated before any stage runs, and
 * every stage works on a snapshot, so the caller's array is never
 * touched and a rejected query has no partial effect.
 */

import { z } from 'zod';

import { InvalidQueryError, QueryError, UnsupportedFieldError } from '@/lib/errors';
import {
  KEY_FIELDS,
  RANGE_FIELDS,
  SORT_ALGORITHMS,
  SORT_FIELDS,
  TEXT_FIELDS,
  type AggregationOptions,
  type AggregationReport,
  type AnalyticsQuery,
  type AnalyticsResult,
  type SearchQuery,
} from '@/types/analytics';
import type { ReceiptRecord } from '@/types/receipt';

import { aggregate } from './aggregation';
import { DEFAULT_ANALYTICS_CONFIG } from './config';
import { searchAll } from './search';
import { sortRecords } from './sort';

// ============================================
// Schemas
// ============================================

const textField = z.enum(TEXT_FIELDS);
const keyField = z.enum(KEY_FIELDS);
const scalar = z.union([z.string(), z.number()]);

export const searchQuerySchema = z.discriminatedUnion('strategy', [
  z
    .object({
      strategy: z.literal('linear'),
      fields: z.union([textField, z.array(textField).min(1)]),
      keyword: z.string().trim().min(1),
      match: z.enum(['substring', 'exact']).optional(),
    })
    .strict(),
  z
    .object({
      strategy: z.literal('binary'),
      field: keyField,
      value: scalar,
      mode: z.enum(['exact', 'prefix']).optional(),
      presorted: z.boolean().optional(),
      algorithm: z.enum(SORT_ALGORITHMS).optional(),
    })
    .strict(),
  z
    .object({
      strategy: z.literal('hash'),
      field: keyField,
      value: scalar,
    })
    .strict(),
  z
    .object({
      strategy: z.literal('fuzzy'),
      field: textField,
      keyword: z.string().trim().min(1),
      maxDistance: z.number().int().nonnegative().optional(),
    })
    .strict(),
  z
    .object({
      strategy: z.literal('pattern'),
      field: textField,
      pattern: z.string(),
      flags: z.string().optional(),
    })
    .strict(),
  z
    .object({
      strategy: z.literal('range'),
      field: z.enum(RANGE_FIELDS),
      min: scalar.optional(),
      max: scalar.optional(),
    })
    .strict(),
]);

export const analyticsQuerySchema = z
  .object({
    search: z.union([searchQuerySchema, z.array(searchQuerySchema)]).optional(),
    sort: z
      .object({
        field: z.enum(SORT_FIELDS),
        algorithm: z.enum(SORT_ALGORITHMS).optional(),
        direction: z.enum(['asc', 'desc']).optional(),
      })
      .strict()
      .optional(),
    aggregate: z
      .union([
        z.boolean(),
        z
          .object({
            windowSize: z.number().int().positive().optional(),
            vendorLimit: z.number().int().positive().optional(),
          })
          .strict(),
      ])
      .optional(),
  })
  .strict();

// ============================================
// Types
// ============================================

export type SafeQueryResult =
  | { success: true; data: AnalyticsResult }
  | { success: false; error: QueryError };

const FIELD_KEYS = new Set(['field', 'fields']);

// ============================================
// AnalyticsFacade Class
// ============================================

export class AnalyticsFacade {
  /**
   * Filter, order and summarize records.
   *
   * @throws QueryError subclasses naming the offending parameter
   */
  query(records: readonly ReceiptRecord[], spec: AnalyticsQuery = {}): AnalyticsResult {
    const parsed = this.validate(spec);
    const snapshot = records.slice();

    const searches: SearchQuery[] =
      parsed.search === undefined
        ? []
        : Array.isArray(parsed.search)
          ? parsed.search
          : [parsed.search];
    let result = searchAll(snapshot, searches);

    if (parsed.sort) {
      result = sortRecords(
        result,
        parsed.sort.field,
        parsed.sort.algorithm ?? DEFAULT_ANALYTICS_CONFIG.defaultSortAlgorithm,
        parsed.sort.direction ?? 'asc'
      );
    }

    let aggregation: AggregationReport | null = null;
    if (parsed.aggregate) {
      const options: AggregationOptions = parsed.aggregate === true ? {} : parsed.aggregate;
      aggregation = aggregate(result, options);
    }

    return { records: result, total: result.length, aggregation };
  }

  /**
   * Like `query`, but query errors come back as a value.
   */
  safeQuery(records: readonly ReceiptRecord[], spec: AnalyticsQuery = {}): SafeQueryResult {
    try {
      return { success: true, data: this.query(records, spec) };
    } catch (error) {
      if (error instanceof QueryError) {
        console.warn(`[AnalyticsFacade] Rejected query (${error.parameter}):`, error.message);
        return { success: false, error };
      }
      throw error;
    }
  }

  /**
   * Validate the whole query up front and translate the first zod issue
   * into a typed query error.
   */
  private validate(spec: unknown): z.infer<typeof analyticsQuerySchema> {
    const result = analyticsQuerySchema.safeParse(spec);
    if (result.success) {
      return result.data;
    }

    const issue = primaryIssue(result.error.issues);
    const path = issue?.path ?? [];
    const parameter = path.length > 0 ? path.join('.') : 'query';
    const last = path[path.length - 1];
    const parentKey = path[path.length - 2];

    const isFieldIssue =
      (typeof last === 'string' && FIELD_KEYS.has(last)) ||
      (typeof last === 'number' && parentKey === 'fields');

    if (isFieldIssue && issue?.code === 'invalid_enum_value') {
      const owner = valueAt(spec, path.slice(0, last === 'field' || last === 'fields' ? -1 : -2));
      throw new UnsupportedFieldError(
        String(valueAt(spec, path)),
        strategyName(owner, path),
        parameter
      );
    }

    throw new InvalidQueryError(issue?.message ?? 'Invalid query', parameter);
  }
}

// ============================================
// Helpers
// ============================================

/**
 * First issue, looking through unions to the branch whose shape the
 * input actually had.
 */
function primaryIssue(issues: readonly z.ZodIssue[]): z.ZodIssue | undefined {
  const issue = issues[0];
  if (issue?.code !== 'invalid_union') {
    return issue;
  }
  for (const branch of issue.unionErrors) {
    const candidate = primaryIssue(branch.issues);
    if (
      candidate &&
      (candidate.code !== 'invalid_type' || candidate.path.length > issue.path.length)
    ) {
      return candidate;
    }
  }
  return issue;
}

function valueAt(input: unknown, path: readonly (string | number)[]): unknown {
  let current: unknown = input;
  for (const key of path) {
    if (typeof current !== 'object' || current === null || !(key in current)) {
      return undefined;
    }
    current = Reflect.get(current, key);
  }
  return current;
}

function strategyName(owner: unknown, path: readonly (string | number)[]): string {
  if (path[0] === 'sort') {
    const algorithm = valueAt(owner, ['algorithm']);
    return typeof algorithm === 'string' ? algorithm : DEFAULT_ANALYTICS_CONFIG.defaultSortAlgorithm;
  }
  const strategy = valueAt(owner, ['strategy']);
  return typeof strategy === 'string' ? strategy : 'search';
}

// ============================================
// Singleton Instance
// ============================================

export const analyticsFacade = new AnalyticsFacade();

/**
 * Convenience function for running an analytics query.
 */
export function query(records: readonly ReceiptRecord[], spec: AnalyticsQuery = {}): AnalyticsResult {
  return analyticsFacade.query(records, spec);
}

/**
 * Convenience function for running an analytics query without throwing
 * on query errors.
 */
export function safeQuery(
  records: readonly ReceiptRecord[],
  spec: AnalyticsQuery = {}
): SafeQueryResult {
  return analyticsFacade.safeQuery(records, spec);
}
