/**
 * Date Extractor
 *
 * Tries the configured date patterns in order over the whole text; the
 * first match that forms a real calendar date inside the allowed year
 * range wins. Output is always ISO `YYYY-MM-DD`.
 */

import { format, isExists } from 'date-fns';

import { roundConfidence } from '@/lib/utils';

import {
  DEFAULT_EXTRACTION_CONFIG,
  type DateExtractionConfig,
  type DateParts,
  type DatePattern,
} from '../extraction-config';
import {
  emptyExtraction,
  type FieldExtraction,
  type FieldExtractor,
} from './types';

/** Boost when a date keyword sits on the same line */
const CONTEXT_BOOST = 0.05;

export class DateExtractor implements FieldExtractor<string> {
  readonly field = 'date' as const;

  constructor(
    private readonly config: DateExtractionConfig = DEFAULT_EXTRACTION_CONFIG.date
  ) {}

  extract(text: string): FieldExtraction<string> {
    if (text.length === 0) {
      return emptyExtraction();
    }

    for (const pattern of this.config.patterns) {
      for (const match of text.matchAll(globalRegex(pattern))) {
        const parts = pattern.parser(match);
        const iso = parts ? this.toIsoDate(parts) : null;
        if (!iso) {
          continue;
        }

        const boost = this.hasDateContext(text, match.index ?? 0) ? CONTEXT_BOOST : 0;
        return {
          value: iso,
          confidence: roundConfidence(pattern.baseConfidence + boost),
          source: pattern.format,
        };
      }
    }

    return emptyExtraction();
  }

  /**
   * Validate parts against the calendar and the year range.
   */
  private toIsoDate({ year, month, day }: DateParts): string | null {
    if (![year, month, day].every(Number.isInteger)) {
      return null;
    }
    if (year < this.config.minYear || year > this.config.maxYear) {
      return null;
    }
    if (!isExists(year, month - 1, day)) {
      return null;
    }
    return format(new Date(year, month - 1, day), 'yyyy-MM-dd');
  }

  private hasDateContext(text: string, index: number): boolean {
    const start = index === 0 ? 0 : text.lastIndexOf('\n', index - 1) + 1;
    const end = text.indexOf('\n', index);
    const line = text.slice(start, end === -1 ? undefined : end).toLowerCase();
    return this.config.contextKeywords.some((keyword) => line.includes(keyword));
  }
}

function globalRegex(pattern: DatePattern): RegExp {
  const { regex } = pattern;
  return regex.global ? regex : new RegExp(regex.source, `${regex.flags}g`);
}
