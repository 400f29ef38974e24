import { InvalidQueryError, UnsupportedFieldError } from '@/lib/errors';
import type { RecordField, SearchStrategyName } from '@/types/analytics';

/**
 * @throws UnsupportedFieldError when `field` is not one of `supported`
 */
export function assertSupportedField(
  strategy: SearchStrategyName,
  field: unknown,
  supported: readonly RecordField[],
  parameter: string = 'field'
): void {
  if (typeof field !== 'string' || !supported.some((name) => name === field)) {
    throw new UnsupportedFieldError(String(field), strategy, parameter);
  }
}

/**
 * Trimmed, non-empty keyword.
 */
export function requireKeyword(keyword: unknown, parameter: string = 'keyword'): string {
  if (typeof keyword !== 'string' || keyword.trim().length === 0) {
    throw new InvalidQueryError('Keyword must be a non-empty string', parameter);
  }
  return keyword.trim();
}
