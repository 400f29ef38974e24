/**
 * Sort Strategies
 *
 * Four interchangeable algorithms behind one contract. Every algorithm
 * sorts the same decorated entries with the same total order (field key,
 * then input position), so all of them return identical output and
 * equal keys keep their input order.
 *
 * Absent values sort after every present value in ascending order.
 * Descending order is the exact reverse of ascending order.
 */

import { InvalidQueryError, UnsupportedFieldError } from '@/lib/errors';
import type { ReceiptRecord } from '@/types/receipt';
import {
  SORT_ALGORITHMS,
  SORT_FIELDS,
  type SortAlgorithm,
  type SortDirection,
  type SortField,
  type SortStrategy,
} from '@/types/analytics';

import { DEFAULT_ANALYTICS_CONFIG } from '../config';
import { compareKeys, getSortKey, type FieldKey } from '../utils';
import { adaptiveSort } from './adaptive';
import { heapSort } from './heapsort';
import { mergeSort } from './mergesort';
import { quickSort } from './quicksort';
import type { SortRoutine } from './types';

// ============================================
// Entries & Comparator
// ============================================

interface SortEntry {
  record: ReceiptRecord;
  key: FieldKey | null;
  index: number;
}

const SORT_FIELD_SET: ReadonlySet<string> = new Set(SORT_FIELDS);
const SORT_ALGORITHM_SET: ReadonlySet<string> = new Set(SORT_ALGORITHMS);

/**
 * Ascending total order: present keys first, absent keys last, input
 * position breaks ties.
 */
function compareEntries(a: SortEntry, b: SortEntry): number {
  if (a.key === null || b.key === null) {
    if (a.key !== b.key) {
      return a.key === null ? 1 : -1;
    }
    return a.index - b.index;
  }
  return compareKeys(a.key, b.key) || a.index - b.index;
}

function createStrategy(
  name: SortAlgorithm,
  routine: SortRoutine,
  stable: boolean,
  complexity: SortStrategy['complexity']
): SortStrategy {
  return Object.freeze({
    name,
    stable,
    complexity: Object.freeze(complexity),
    sort(records: readonly ReceiptRecord[], field: SortField, direction: SortDirection) {
      assertSortField(field, name);
      const entries = records.map((record, index) => ({
        record,
        key: getSortKey(record, field),
        index,
      }));
      const ordered = routine(entries, compareEntries).map((entry) => entry.record);
      return direction === 'desc' ? ordered.reverse() : ordered;
    },
  });
}

// ============================================
// Dispatch Table
// ============================================

export const SORT_STRATEGIES: Readonly<Record<SortAlgorithm, SortStrategy>> = Object.freeze({
  quicksort: createStrategy('quicksort', quickSort, false, {
    average: 'O(n log n)',
    worst: 'O(n²)',
  }),
  mergesort: createStrategy('mergesort', mergeSort, true, {
    average: 'O(n log n)',
    worst: 'O(n log n)',
  }),
  heapsort: createStrategy('heapsort', heapSort, false, {
    average: 'O(n log n)',
    worst: 'O(n log n)',
  }),
  adaptive: createStrategy('adaptive', adaptiveSort, true, {
    average: 'O(n log n)',
    worst: 'O(n log n)',
  }),
});

export function isSortAlgorithm(value: unknown): value is SortAlgorithm {
  return typeof value === 'string' && SORT_ALGORITHM_SET.has(value);
}

function assertSortField(field: string, algorithm: string): void {
  if (!SORT_FIELD_SET.has(field)) {
    throw new UnsupportedFieldError(field, algorithm);
  }
}

/**
 * Sort records on one field.
 *
 * @returns A new array; the input is not modified
 * @throws UnsupportedFieldError for a field without a comparator
 * @throws InvalidQueryError for an unknown algorithm or direction
 */
export function sortRecords(
  records: readonly ReceiptRecord[],
  field: SortField,
  algorithm: SortAlgorithm = DEFAULT_ANALYTICS_CONFIG.defaultSortAlgorithm,
  direction: SortDirection = 'asc'
): ReceiptRecord[] {
  if (!isSortAlgorithm(algorithm)) {
    throw new InvalidQueryError(`Unknown sort algorithm "${String(algorithm)}"`, 'algorithm');
  }
  if (direction !== 'asc' && direction !== 'desc') {
    throw new InvalidQueryError(`Unknown sort direction "${String(direction)}"`, 'direction');
  }
  return SORT_STRATEGIES[algorithm].sort(records, field, direction);
}

export { quickSort, mergeSort, heapSort, adaptiveSort };
export type { SortRoutine, TotalOrder } from './types';
