/**
 * Utility Functions for receipt-ledger
 *
 * Money and number helpers shared by extraction, aggregation and export.
 */

/**
 * Converts an amount to integer cents.
 */
export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

/**
 * Rounds to two decimal places (cents).
 */
export function roundCurrency(amount: number): number {
  return toCents(amount) / 100;
}

/**
 * Rounds a confidence score to two decimals and clamps it to [0, 1].
 */
export function roundConfidence(value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    return 0;
  }
  return Math.min(1, Math.round(value * 100) / 100);
}

/**
 * Escapes a string for literal use inside a RegExp.
 */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Type guard to check if a value is defined (not null or undefined)
 */
export function isDefined<T>(value: T | null | undefined): value is T {
  return value !== null && value !== undefined;
}

/**
 * Recursively freezes a plain object/array graph. RegExp instances are
 * left writable so `lastIndex` keeps working.
 */
export function deepFreeze<T>(value: T): Readonly<T> {
  if (
    value !== null &&
    typeof value === 'object' &&
    !(value instanceof RegExp) &&
    !Object.isFrozen(value)
  ) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}
