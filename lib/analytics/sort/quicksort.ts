import type { SortRoutine, TotalOrder } from './types';

/**
 * Partition-exchange sort with a middle-element pivot.
 *
 * Average O(n log n). The worst case is O(n²) when pivots keep landing
 * on an extreme, which crafted inputs can force; record collections are
 * small enough that this is accepted. The smaller partition is recursed
 * into first, so stack depth stays O(log n).
 */
export const quickSort: SortRoutine = (items, compare) => {
  const result = items.slice();
  sortRange(result, 0, result.length - 1, compare);
  return result;
};

function sortRange<T>(items: T[], low: number, high: number, compare: TotalOrder<T>): void {
  let lo = low;
  let hi = high;

  while (lo < hi) {
    const pivotIndex = partition(items, lo, hi, compare);
    if (pivotIndex - lo < hi - pivotIndex) {
      sortRange(items, lo, pivotIndex - 1, compare);
      lo = pivotIndex + 1;
    } else {
      sortRange(items, pivotIndex + 1, hi, compare);
      hi = pivotIndex - 1;
    }
  }
}

/**
 * Lomuto partition around the middle element. Returns the pivot's
 * final position.
 */
function partition<T>(items: T[], lo: number, hi: number, compare: TotalOrder<T>): number {
  swap(items, lo + Math.floor((hi - lo) / 2), hi);
  const pivot = items[hi];
  if (pivot === undefined) {
    return hi;
  }

  let store = lo;
  for (let i = lo; i < hi; i++) {
    const item = items[i];
    if (item !== undefined && compare(item, pivot) < 0) {
      swap(items, i, store);
      store++;
    }
  }
  swap(items, store, hi);
  return store;
}

function swap<T>(items: T[], i: number, j: number): void {
  const a = items[i];
  const b = items[j];
  if (a === undefined || b === undefined) {
    return;
  }
  items[i] = b;
  items[j] = a;
}
