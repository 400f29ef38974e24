import type { SortRoutine, TotalOrder } from './types';

/**
 * Top-down merge sort. Stable, O(n log n) in every case, O(n) extra
 * space.
 */
export const mergeSort: SortRoutine = (items, compare) => {
  if (items.length <= 1) {
    return items.slice();
  }
  const middle = Math.floor(items.length / 2);
  return mergeRuns(
    mergeSort(items.slice(0, middle), compare),
    mergeSort(items.slice(middle), compare),
    compare
  );
};

/**
 * Merge two ordered runs. On ties the left run goes first.
 */
export function mergeRuns<T>(left: readonly T[], right: readonly T[], compare: TotalOrder<T>): T[] {
  const merged: T[] = [];
  let i = 0;
  let j = 0;

  while (i < left.length && j < right.length) {
    const a = left[i];
    const b = right[j];
    if (a === undefined || b === undefined) {
      break;
    }
    if (compare(b, a) < 0) {
      merged.push(b);
      j++;
    } else {
      merged.push(a);
      i++;
    }
  }

  return merged.concat(left.slice(i), right.slice(j));
}
