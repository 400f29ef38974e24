/**
 * Shared contract for the field extractors.
 */

import type { ExtractedFieldName } from '@/types/receipt';

/**
 * One extractor's verdict for one field.
 */
export interface FieldExtraction<T> {
  /** Extracted value, or null when nothing usable was found */
  value: T | null;

  /** Confidence in the value (0-1); 0 when the value is absent */
  confidence: number;

  /** Which rule produced the value (for debugging/UI) */
  source: string | null;
}

/**
 * A heuristic extractor over normalized receipt text. Implementations
 * are pure: the same text and config always give the same result.
 */
export interface FieldExtractor<T> {
  readonly field: ExtractedFieldName;
  extract(text: string): FieldExtraction<T>;
}

export function emptyExtraction<T>(): FieldExtraction<T> {
  return { value: null, confidence: 0, source: null };
}
