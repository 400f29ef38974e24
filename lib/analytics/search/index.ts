/**
 * Search Strategies
 *
 * Closed set of strategies, one dispatch table built once at load.
 * Every strategy except hash returns matches in input order; hash lists
 * them in input order too, though its contract does not require it.
 */

import { InvalidQueryError } from '@/lib/errors';
import type {
  SearchQuery,
  SearchQueryFor,
  SearchStrategy,
  SearchStrategyName,
} from '@/types/analytics';
import type { ReceiptRecord } from '@/types/receipt';
import { deepFreeze } from '@/lib/utils';

import { binarySearch } from './binary-search';
import { fuzzySearch } from './fuzzy-search';
import { hashSearch } from './hash-search';
import { linearSearch } from './linear-search';
import { patternSearch } from './pattern-search';
import { rangeSearch } from './range-search';

// ============================================
// Dispatch Table
// ============================================

export type SearchStrategyTable = {
  readonly [N in SearchStrategyName]: SearchStrategy<SearchQueryFor<N>>;
};

export const SEARCH_STRATEGIES: SearchStrategyTable = deepFreeze({
  linear: linearSearch,
  binary: binarySearch,
  hash: hashSearch,
  fuzzy: fuzzySearch,
  pattern: patternSearch,
  range: rangeSearch,
});

// ============================================
// Search
// ============================================

/**
 * Run one search query.
 *
 * @throws UnsupportedFieldError, PatternError or InvalidQueryError for a bad query
 */
export function search(records: readonly ReceiptRecord[], query: SearchQuery): ReceiptRecord[] {
  switch (query.strategy) {
    case 'linear':
      return SEARCH_STRATEGIES.linear.search(records, query);
    case 'binary':
      return SEARCH_STRATEGIES.binary.search(records, query);
    case 'hash':
      return SEARCH_STRATEGIES.hash.search(records, query);
    case 'fuzzy':
      return SEARCH_STRATEGIES.fuzzy.search(records, query);
    case 'pattern':
      return SEARCH_STRATEGIES.pattern.search(records, query);
    case 'range':
      return SEARCH_STRATEGIES.range.search(records, query);
    default:
      throw new InvalidQueryError(
        `Unknown search strategy "${describeStrategy(query)}"`,
        'strategy'
      );
  }
}

/**
 * Combine queries with logical AND. Each query runs over the full input
 * independently; a record is kept when every query matched it. Output
 * follows input order.
 */
export function searchAll(
  records: readonly ReceiptRecord[],
  queries: readonly SearchQuery[]
): ReceiptRecord[] {
  if (queries.length === 0) {
    return records.slice();
  }

  const matchSets = queries.map((query) => new Set(search(records, query)));
  return records.filter((record) => matchSets.every((set) => set.has(record)));
}

function describeStrategy(query: unknown): string {
  if (typeof query === 'object' && query !== null && 'strategy' in query) {
    return String(query.strategy);
  }
  return String(query);
}

export { buildHashIndex } from './hash-search';
export { compilePattern } from './pattern-search';
export { fuzzyThreshold } from './fuzzy-search';
export { linearSearch, binarySearch, hashSearch, fuzzySearch, patternSearch, rangeSearch };
