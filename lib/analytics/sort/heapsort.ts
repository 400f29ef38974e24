import type { SortRoutine, TotalOrder } from './types';

/**
 * In-place heapsort on a copy: build a max-heap, then repeatedly move
 * the root behind the shrinking heap. O(n log n) in every case, not
 * stable on its own.
 */
export const heapSort: SortRoutine = (items, compare) => {
  const heap = items.slice();

  for (let i = Math.floor(heap.length / 2) - 1; i >= 0; i--) {
    siftDown(heap, i, heap.length, compare);
  }

  for (let end = heap.length - 1; end > 0; end--) {
    swap(heap, 0, end);
    siftDown(heap, 0, end, compare);
  }

  return heap;
};

function siftDown<T>(heap: T[], start: number, size: number, compare: TotalOrder<T>): void {
  let root = start;

  for (;;) {
    const left = 2 * root + 1;
    const right = left + 1;
    let largest = root;

    if (left < size && greater(heap, left, largest, compare)) {
      largest = left;
    }
    if (right < size && greater(heap, right, largest, compare)) {
      largest = right;
    }
    if (largest === root) {
      return;
    }

    swap(heap, root, largest);
    root = largest;
  }
}

function greater<T>(heap: T[], i: number, j: number, compare: TotalOrder<T>): boolean {
  const a = heap[i];
  const b = heap[j];
  return a !== undefined && b !== undefined && compare(a, b) > 0;
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
