/**
 * Category Extractor
 *
 * Keyword classifier. Each category scores the number of word-bounded
 * keyword occurrences in the lowercased text; the highest score wins and
 * ties follow the configured priority. No match at all yields `other`
 * with zero confidence.
 *
 * Confidence grows with the number of hits and shrinks when the
 * runner-up is close:
 *
 *   min(0.95, 0.45 + 0.1 * hits) * (0.7 + 0.3 * margin)
 *
 * where margin = (hits - runnerUpHits) / hits.
 */

import { escapeRegExp, roundConfidence } from '@/lib/utils';
import type { ReceiptCategory } from '@/types/receipt';

import {
  DEFAULT_EXTRACTION_CONFIG,
  type CategoryExtractionConfig,
} from '../extraction-config';
import type { FieldExtraction, FieldExtractor } from './types';

interface CategoryMatcher {
  category: ReceiptCategory;
  keywords: ReadonlyArray<{ keyword: string; regex: RegExp }>;
}

export interface CategoryScore {
  category: ReceiptCategory;
  hits: number;
  matchedKeywords: string[];
}

const BASE_CONFIDENCE = 0.45;
const PER_HIT_CONFIDENCE = 0.1;
const MAX_CONFIDENCE = 0.95;

export class CategoryExtractor implements FieldExtractor<ReceiptCategory> {
  readonly field = 'category' as const;

  private readonly matchers: CategoryMatcher[];

  constructor(config: CategoryExtractionConfig = DEFAULT_EXTRACTION_CONFIG.category) {
    this.matchers = config.priority.map((category) => ({
      category,
      keywords: config.keywords[category].map((keyword) => ({
        keyword,
        regex: new RegExp(
          `(?<![\\p{L}\\p{N}])${escapeRegExp(keyword)}(?![\\p{L}\\p{N}])`,
          'gu'
        ),
      })),
    }));
  }

  /**
   * Hit counts per category, in priority order.
   */
  score(text: string): CategoryScore[] {
    const lower = text.toLowerCase();

    return this.matchers.map(({ category, keywords }) => {
      let hits = 0;
      const matchedKeywords: string[] = [];
      for (const { keyword, regex } of keywords) {
        const count = lower.match(regex)?.length ?? 0;
        if (count > 0) {
          hits += count;
          matchedKeywords.push(keyword);
        }
      }
      return { category, hits, matchedKeywords };
    });
  }

  extract(text: string): FieldExtraction<ReceiptCategory> {
    const scores = this.score(text);

    let best: CategoryScore | null = null;
    for (const score of scores) {
      if (!best || score.hits > best.hits) {
        best = score;
      }
    }

    if (!best || best.hits === 0) {
      return { value: 'other', confidence: 0, source: null };
    }

    const winner = best;
    const runnerUp = scores
      .filter((score) => score !== winner)
      .reduce((max, score) => Math.max(max, score.hits), 0);
    const margin = (winner.hits - runnerUp) / winner.hits;

    const confidence =
      Math.min(MAX_CONFIDENCE, BASE_CONFIDENCE + PER_HIT_CONFIDENCE * winner.hits) *
      (0.7 + 0.3 * margin);

    return {
      value: winner.category,
      confidence: roundConfidence(confidence),
      source: `Keywords: ${winner.matchedKeywords.join(', ')}`,
    };
  }
}
