import { mergeRuns } from './mergesort';
import type { SortRoutine, TotalOrder } from './types';

/**
 * Natural merge sort. Splits the input into maximal ordered runs
 * (strictly descending runs are reversed in place) and merges
 * neighbouring runs until one is left.
 *
 * O(n) on already-ordered or reverse-ordered input, O(n log n) worst.
 */
export const adaptiveSort: SortRoutine = (items, compare) => {
  let runs = findRuns(items, compare);
  if (runs.length === 0) {
    return [];
  }

  while (runs.length > 1) {
    const next: (typeof runs)[number][] = [];
    for (let i = 0; i < runs.length; i += 2) {
      const left = runs[i];
      const right = runs[i + 1];
      if (left === undefined) {
        continue;
      }
      next.push(right === undefined ? left : mergeRuns(left, right, compare));
    }
    runs = next;
  }

  return runs[0] ?? [];
};

function findRuns<T>(items: readonly T[], compare: TotalOrder<T>): T[][] {
  const runs: T[][] = [];
  let i = 0;

  while (i < items.length) {
    const first = items[i];
    if (first === undefined) {
      break;
    }
    const run: T[] = [first];
    i++;

    const second = items[i];
    const descending = second !== undefined && compare(second, first) < 0;

    while (i < items.length) {
      const previous = run[run.length - 1];
      const item = items[i];
      if (previous === undefined || item === undefined) {
        break;
      }
      const order = compare(item, previous);
      if (descending ? order >= 0 : order < 0) {
        break;
      }
      run.push(item);
      i++;
    }

    runs.push(descending ? run.reverse() : run);
  }

  return runs;
}
