/**
 * Field access and comparison helpers shared by the search, sort and
 * aggregation code.
 */

import { InvalidQueryError } from '@/lib/errors';
import { isIsoDate } from '@/lib/processing/record-invariants';
import { toCents } from '@/lib/utils';
import type { ReceiptRecord } from '@/types/receipt';
import type { KeyField, SortField, TextField } from '@/types/analytics';

// ============================================
// Types
// ============================================

/** Comparable scalar extracted from a record field */
export type FieldKey = string | number;

// ============================================
// Field Access
// ============================================

export function textKey(value: string): string {
  return value.trim().toLowerCase();
}

/**
 * Raw text value of a text field, or null when absent.
 */
export function getTextValue(record: ReceiptRecord, field: TextField): string | null {
  switch (field) {
    case 'vendor':
      return record.vendor;
    case 'category':
      return record.category;
    case 'rawText':
      return record.rawText;
  }
}

/**
 * Sort key for a field. Text compares case-insensitively, dates as ISO
 * strings, timestamps as epoch milliseconds.
 */
export function getSortKey(record: ReceiptRecord, field: SortField): FieldKey | null {
  switch (field) {
    case 'vendor':
      return record.vendor === null ? null : textKey(record.vendor);
    case 'category':
      return record.category;
    case 'transactionDate':
      return record.transactionDate;
    case 'amount':
      return record.amount;
    case 'createdAt':
      return record.createdAt.getTime();
    case 'overallConfidence':
      return record.overallConfidence;
  }
}

/**
 * Equality key for a field: text lowercased and trimmed, amounts in
 * cents, dates as ISO strings. Ordered the same way as `getSortKey`.
 */
export function getLookupKey(record: ReceiptRecord, field: KeyField): FieldKey | null {
  if (field === 'amount') {
    return record.amount === null ? null : toCents(record.amount);
  }
  return getSortKey(record, field);
}

/**
 * Normalize a query operand into the shape `getLookupKey` produces.
 *
 * @throws InvalidQueryError when the operand cannot be a value of the field
 */
export function normalizeLookupValue(
  field: KeyField,
  value: string | number,
  parameter: string = 'value'
): FieldKey {
  switch (field) {
    case 'amount': {
      const amount = typeof value === 'number' ? value : Number(value.trim());
      if (!Number.isFinite(amount) || (typeof value === 'string' && value.trim() === '')) {
        throw new InvalidQueryError(`Expected a numeric amount, got "${value}"`, parameter);
      }
      return toCents(amount);
    }
    case 'transactionDate': {
      const date = String(value).trim();
      if (!isIsoDate(date)) {
        throw new InvalidQueryError(`Expected a YYYY-MM-DD date, got "${value}"`, parameter);
      }
      return date;
    }
    case 'vendor':
    case 'category':
      return textKey(String(value));
  }
}

// ============================================
// Comparison
// ============================================

/**
 * Compare two keys of the same field. Strings compare by code unit so
 * the order never depends on the host locale.
 */
export function compareKeys(a: FieldKey, b: FieldKey): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a === b ? 0 : a < b ? -1 : 1;
  }
  const left = String(a);
  const right = String(b);
  return left === right ? 0 : left < right ? -1 : 1;
}

/**
 * Keep input order: return the members of `matched` as they appear in
 * `records`.
 */
export function inInputOrder(
  records: readonly ReceiptRecord[],
  matched: Iterable<ReceiptRecord>
): ReceiptRecord[] {
  const keep = new Set(matched);
  return records.filter((record) => keep.has(record));
}

// ============================================
// Levenshtein Distance
// ============================================

/**
 * Calculate the Levenshtein distance between two strings.
 * The Levenshtein distance is the minimum number of single-character
 * edits (insertions, deletions, substitutions) required to change
 * one string into the other.
 */
export function levenshteinDistance(str1: string, str2: string): number {
  const len1 = str1.length;
  const len2 = str2.length;

  // Early termination for empty strings
  if (len1 === 0) {
    return len2;
  }
  if (len2 === 0) {
    return len1;
  }

  // Two rows are enough: row i only reads row i - 1
  let previous = Array.from({ length: len2 + 1 }, (_, j) => j);
  let current = new Array<number>(len2 + 1).fill(0);

  for (let i = 1; i <= len1; i++) {
    current[0] = i;
    for (let j = 1; j <= len2; j++) {
      const cost = str1[i - 1] === str2[j - 1] ? 0 : 1;
      current[j] = Math.min(
        (previous[j] ?? 0) + 1, // Deletion
        (current[j - 1] ?? 0) + 1, // Insertion
        (previous[j - 1] ?? 0) + cost // Substitution
      );
    }
    [previous, current] = [current, previous];
  }

  return previous[len2] ?? 0;
}
