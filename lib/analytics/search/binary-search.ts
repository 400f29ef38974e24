import { InvalidQueryError } from '@/lib/errors';
import {
  KEY_FIELDS,
  type BinarySearchQuery,
  type SearchStrategy,
} from '@/types/analytics';
import type { ReceiptRecord } from '@/types/receipt';

import { DEFAULT_ANALYTICS_CONFIG } from '../config';
import { sortRecords } from '../sort';
import {
  compareKeys,
  getLookupKey,
  inInputOrder,
  normalizeLookupValue,
  textKey,
  type FieldKey,
} from '../utils';
import { assertSupportedField } from './shared';

/**
 * Equality or prefix lookup by bisection on records ordered ascending
 * on the field. Unless the caller declares the input `presorted`, the
 * records are first ordered with the declared sort strategy.
 *
 * O(log n) to locate the first match, plus one step per match.
 * Results come back in input order.
 */
export const binarySearch: SearchStrategy<BinarySearchQuery> = {
  name: 'binary',
  supportedFields: KEY_FIELDS,
  search(records, query) {
    assertSupportedField('binary', query.field, KEY_FIELDS);

    const mode = query.mode ?? 'exact';
    if (mode !== 'exact' && mode !== 'prefix') {
      throw new InvalidQueryError(`Unknown binary search mode "${String(mode)}"`, 'mode');
    }
    if (mode === 'prefix' && query.field === 'amount') {
      throw new InvalidQueryError('Prefix lookup needs a text or date field', 'mode');
    }

    const target: FieldKey =
      mode === 'prefix'
        ? textKey(String(query.value))
        : normalizeLookupValue(query.field, query.value);

    const ordered = query.presorted
      ? records.slice()
      : sortRecords(
          records,
          query.field,
          query.algorithm ?? DEFAULT_ANALYTICS_CONFIG.defaultSortAlgorithm,
          'asc'
        );
    const keys = ordered.map((record) => getLookupKey(record, query.field));

    const matches = (key: FieldKey | null): boolean =>
      key !== null &&
      (mode === 'prefix' ? String(key).startsWith(String(target)) : compareKeys(key, target) === 0);

    const matched: ReceiptRecord[] = [];
    for (let i = lowerBound(keys, target); i < keys.length && matches(keys[i] ?? null); i++) {
      const record = ordered[i];
      if (record) {
        matched.push(record);
      }
    }

    return inInputOrder(records, matched);
  },
};

/**
 * First position whose key is not below `target`. Absent keys rank
 * above everything, matching the sort order.
 */
function lowerBound(keys: readonly (FieldKey | null)[], target: FieldKey): number {
  let lo = 0;
  let hi = keys.length;

  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const key = keys[mid] ?? null;
    if (key !== null && compareKeys(key, target) < 0) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }

  return lo;
}
