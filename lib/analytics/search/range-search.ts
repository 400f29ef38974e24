import { InvalidQueryError } from '@/lib/errors';
import {
  RANGE_FIELDS,
  type RangeSearchQuery,
  type SearchStrategy,
} from '@/types/analytics';

import { getLookupKey, normalizeLookupValue, compareKeys, type FieldKey } from '../utils';
import { assertSupportedField } from './shared';

/**
 * Inclusive [min, max] filter on amount or transaction date. Either
 * bound may be omitted. Amounts compare in cents; records without the
 * field never match.
 */
export const rangeSearch: SearchStrategy<RangeSearchQuery> = {
  name: 'range',
  supportedFields: RANGE_FIELDS,
  search(records, query) {
    assertSupportedField('range', query.field, RANGE_FIELDS);

    const min = query.min === undefined ? null : normalizeLookupValue(query.field, query.min, 'min');
    const max = query.max === undefined ? null : normalizeLookupValue(query.field, query.max, 'max');

    if (min !== null && max !== null && compareKeys(min, max) > 0) {
      throw new InvalidQueryError(
        `Range minimum ${String(query.min)} is greater than maximum ${String(query.max)}`,
        'min'
      );
    }

    return records.filter((record) => {
      const key: FieldKey | null = getLookupKey(record, query.field);
      return (
        key !== null &&
        (min === null || compareKeys(key, min) >= 0) &&
        (max === null || compareKeys(key, max) <= 0)
      );
    });
  },
};
