import {
  KEY_FIELDS,
  type HashSearchQuery,
  type KeyField,
  type SearchStrategy,
} from '@/types/analytics';
import type { ReceiptId, ReceiptRecord } from '@/types/receipt';

import { getLookupKey, normalizeLookupValue, type FieldKey } from '../utils';
import { assertSupportedField } from './shared';

/**
 * Group records by normalized field value, keeping `pick(record)` for
 * each in input order. Records without the field are left out.
 */
function groupByKey<T>(
  records: readonly ReceiptRecord[],
  field: KeyField,
  pick: (record: ReceiptRecord) => T
): Map<FieldKey, T[]> {
  assertSupportedField('hash', field, KEY_FIELDS);

  const index = new Map<FieldKey, T[]>();
  for (const record of records) {
    const key = getLookupKey(record, field);
    if (key === null) {
      continue;
    }
    const entries = index.get(key);
    if (entries) {
      entries.push(pick(record));
    } else {
      index.set(key, [pick(record)]);
    }
  }
  return index;
}

/**
 * Map each normalized field value to the ids of the records holding it.
 * Ids are listed in input order. Records without the field are left out.
 */
export function buildHashIndex(
  records: readonly ReceiptRecord[],
  field: KeyField
): Map<FieldKey, ReceiptId[]> {
  return groupByKey(records, field, (record) => record.id);
}

/**
 * Exact-value lookup through a hash index. O(n) to build the index,
 * O(1) average per lookup. Not usable for substring or fuzzy matching.
 *
 * The index holds the records themselves, so two records sharing an id
 * (an original and its patched copy) are told apart.
 */
export const hashSearch: SearchStrategy<HashSearchQuery> = {
  name: 'hash',
  supportedFields: KEY_FIELDS,
  search(records, query) {
    const index = groupByKey(records, query.field, (record) => record);
    return index.get(normalizeLookupValue(query.field, query.value)) ?? [];
  },
};
