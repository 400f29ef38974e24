import { InvalidQueryError } from '@/lib/errors';
import {
  TEXT_FIELDS,
  type FuzzySearchQuery,
  type SearchStrategy,
} from '@/types/analytics';

import { DEFAULT_ANALYTICS_CONFIG } from '../config';
import { getTextValue, levenshteinDistance, textKey } from '../utils';
import { assertSupportedField, requireKeyword } from './shared';

/**
 * Edit distance allowed for a query: exact below three characters,
 * then one edit per three characters up to the configured cap.
 */
export function fuzzyThreshold(
  keyword: string,
  maxDistance: number = DEFAULT_ANALYTICS_CONFIG.maxFuzzyDistance
): number {
  return keyword.length < 3 ? 0 : Math.min(maxDistance, Math.floor(keyword.length / 3));
}

/**
 * Levenshtein match against the whole field value or any single word
 * of it, case-insensitive. O(n·q·m) for n records, query length q and
 * field length m.
 */
export const fuzzySearch: SearchStrategy<FuzzySearchQuery> = {
  name: 'fuzzy',
  supportedFields: TEXT_FIELDS,
  search(records, query) {
    assertSupportedField('fuzzy', query.field, TEXT_FIELDS);
    const keyword = textKey(requireKeyword(query.keyword));

    if (
      query.maxDistance !== undefined &&
      (!Number.isInteger(query.maxDistance) || query.maxDistance < 0)
    ) {
      throw new InvalidQueryError('maxDistance must be a non-negative integer', 'maxDistance');
    }
    const threshold = query.maxDistance ?? fuzzyThreshold(keyword);

    return records.filter((record) => {
      const value = getTextValue(record, query.field);
      if (value === null) {
        return false;
      }
      const normalized = textKey(value);
      if (levenshteinDistance(keyword, normalized) <= threshold) {
        return true;
      }
      return normalized
        .split(/\s+/)
        .some((token) => token.length > 0 && levenshteinDistance(keyword, token) <= threshold);
    });
  },
};
