import { InvalidQueryError } from '@/lib/errors';
import {
  TEXT_FIELDS,
  type LinearSearchQuery,
  type SearchStrategy,
  type TextField,
} from '@/types/analytics';

import { getTextValue, textKey } from '../utils';
import { assertSupportedField, requireKeyword } from './shared';

/**
 * Full scan with a case-insensitive keyword match against one or more
 * text fields. A record matches when any of the fields matches.
 * O(n·m) for n records and field length m.
 */
export const linearSearch: SearchStrategy<LinearSearchQuery> = {
  name: 'linear',
  supportedFields: TEXT_FIELDS,
  search(records, query) {
    const fields: TextField[] = Array.isArray(query.fields) ? query.fields : [query.fields];
    if (fields.length === 0) {
      throw new InvalidQueryError('At least one field is required', 'fields');
    }
    fields.forEach((field) => assertSupportedField('linear', field, TEXT_FIELDS, 'fields'));

    const needle = textKey(requireKeyword(query.keyword));
    const exact = query.match === 'exact';

    return records.filter((record) =>
      fields.some((field) => {
        const value = getTextValue(record, field);
        if (value === null) {
          return false;
        }
        const haystack = textKey(value);
        return exact ? haystack === needle : haystack.includes(needle);
      })
    );
  },
};
