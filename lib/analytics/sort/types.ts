/**
 * A comparator that never returns 0 for two distinct items.
 */
export type TotalOrder<T> = (a: T, b: T) => number;

/**
 * An algorithm over a total order. Implementations return a new array
 * and leave the input untouched.
 */
export type SortRoutine = <T>(items: readonly T[], compare: TotalOrder<T>) => T[];
