import { PatternError } from '@/lib/errors';
import {
  TEXT_FIELDS,
  type PatternSearchQuery,
  type SearchStrategy,
} from '@/types/analytics';

import { DEFAULT_ANALYTICS_CONFIG } from '../config';
import { getTextValue } from '../utils';
import { assertSupportedField } from './shared';

/**
 * Compile a user pattern. `g` and `y` are dropped since they make
 * `test()` stateful.
 *
 * @throws PatternError for an invalid or oversized expression or bad flags
 */
export function compilePattern(
  pattern: unknown,
  flags: unknown = DEFAULT_ANALYTICS_CONFIG.defaultPatternFlags,
  maxLength: number = DEFAULT_ANALYTICS_CONFIG.maxPatternLength
): RegExp {
  if (typeof pattern !== 'string') {
    throw new PatternError('Pattern must be a string', String(pattern));
  }
  if (pattern.length > maxLength) {
    throw new PatternError(
      `Pattern is ${pattern.length} characters long; the limit is ${maxLength}`,
      pattern
    );
  }
  if (typeof flags !== 'string') {
    throw new PatternError('Flags must be a string', pattern, 'flags');
  }

  try {
    new RegExp('', flags);
  } catch {
    throw new PatternError(`Invalid regular expression flags "${flags}"`, pattern, 'flags');
  }

  try {
    return new RegExp(pattern, flags.replace(/[gy]/g, ''));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PatternError(`Invalid regular expression: ${reason}`, pattern);
  }
}

/**
 * Regular-expression test against one text field. Records without the
 * field never match.
 */
export const patternSearch: SearchStrategy<PatternSearchQuery> = {
  name: 'pattern',
  supportedFields: TEXT_FIELDS,
  search(records, query) {
    assertSupportedField('pattern', query.field, TEXT_FIELDS);
    const regex = compilePattern(query.pattern, query.flags);

    return records.filter((record) => {
      const value = getTextValue(record, query.field);
      return value !== null && regex.test(value);
    });
  },
};
