/**
 * Vendor Extractor
 *
 * Looks at the first few normalized lines for a store-name-like line.
 * Each qualifying line gets a pattern strength; the strongest wins,
 * then the longest, then the earliest.
 *
 * Pattern strengths:
 * - explicit label ("Merchant: Joe's Diner"): 0.95
 * - all-caps header ("WALMART"):              0.90
 * - title case ("Corner Bakery"):             0.75
 * - anything else with a leading capital:     0.40
 *
 * A store-name suffix (market, cafe, ...) and being the very first line
 * each add 0.05.
 */

import { escapeRegExp, roundConfidence } from '@/lib/utils';

import {
  DEFAULT_EXTRACTION_CONFIG,
  type VendorExtractionConfig,
} from '../extraction-config';
import { toLines } from '../text-normalizer';
import {
  emptyExtraction,
  type FieldExtraction,
  type FieldExtractor,
} from './types';

// ============================================
// Types
// ============================================

interface VendorCandidate {
  value: string;
  index: number;
  strength: number;
  confidence: number;
  pattern: string;
}

// ============================================
// Constants
// ============================================

const LABELLED_STRENGTH = 0.95;
const ALL_CAPS_STRENGTH = 0.9;
const TITLE_CASE_STRENGTH = 0.75;
const GENERIC_STRENGTH = 0.4;
const SUFFIX_BOOST = 0.05;
const FIRST_LINE_BOOST = 0.05;

/** Short words allowed in lowercase inside a title-case name */
const CONNECTIVES = new Set(['of', 'the', 'and', 'de', 'la', 'le', 'du', 'on', 'at']);

/** Characters that count as part of a name rather than noise */
const NAME_CHARACTER = /[\p{L}&'.\-]/u;

function wordPattern(words: readonly string[], flags: string): RegExp | null {
  if (words.length === 0) {
    return null;
  }
  const alternatives = words.map(escapeRegExp).join('|');
  return new RegExp(
    `(?<![\\p{L}\\p{N}])(?:${alternatives})(?![\\p{L}\\p{N}])`,
    flags
  );
}

// ============================================
// VendorExtractor Class
// ============================================

export class VendorExtractor implements FieldExtractor<string> {
  readonly field = 'vendor' as const;

  private readonly excludedPattern: RegExp | null;
  private readonly suffixPattern: RegExp | null;
  private readonly labelPattern: RegExp | null;

  constructor(
    private readonly config: VendorExtractionConfig = DEFAULT_EXTRACTION_CONFIG.vendor
  ) {
    this.excludedPattern = wordPattern(config.excludedWords, 'iu');
    this.suffixPattern = wordPattern(config.storeSuffixes, 'iu');
    this.labelPattern =
      config.labelPrefixes.length > 0
        ? new RegExp(
            `^(?:${config.labelPrefixes.map(escapeRegExp).join('|')})(?:\\s+name)?\\s*[:#-]\\s*(.+)$`,
            'iu'
          )
        : null;
  }

  extract(text: string): FieldExtraction<string> {
    const lines = toLines(text).slice(0, this.config.headerLineCount);
    const candidates: VendorCandidate[] = [];

    lines.forEach((line, index) => {
      const candidate = this.scoreLine(line, index);
      if (candidate) {
        candidates.push(candidate);
      }
    });

    // Longest name wins; pattern strength only breaks length ties
    candidates.sort((a, b) => {
      if (a.value.length !== b.value.length) {
        return b.value.length - a.value.length;
      }
      if (a.strength !== b.strength) {
        return b.strength - a.strength;
      }
      return a.index - b.index;
    });

    const best = candidates[0];
    if (!best) {
      return emptyExtraction();
    }

    return {
      value: best.value,
      confidence: roundConfidence(best.confidence),
      source: best.pattern,
    };
  }

  private scoreLine(line: string, index: number): VendorCandidate | null {
    const labelled = this.labelPattern?.exec(line);
    if (labelled) {
      const value = cleanVendorName(labelled[1] ?? '');
      if (!this.isStoreNameLike(value)) {
        return null;
      }
      return this.buildCandidate(value, index, LABELLED_STRENGTH, 'Labelled vendor');
    }

    if (this.excludedPattern?.test(line)) {
      return null;
    }

    const value = cleanVendorName(line);
    if (!this.isStoreNameLike(value)) {
      return null;
    }

    if (isAllCaps(value)) {
      return this.buildCandidate(value, index, ALL_CAPS_STRENGTH, 'All caps line');
    }
    if (isTitleCase(value)) {
      return this.buildCandidate(value, index, TITLE_CASE_STRENGTH, 'Title case line');
    }
    return this.buildCandidate(value, index, GENERIC_STRENGTH, 'Capitalised line');
  }

  private buildCandidate(
    value: string,
    index: number,
    strength: number,
    pattern: string
  ): VendorCandidate {
    let confidence = strength;
    if (this.suffixPattern?.test(value)) {
      confidence += SUFFIX_BOOST;
    }
    if (index === 0) {
      confidence += FIRST_LINE_BOOST;
    }
    return { value, index, strength, confidence: Math.min(1, confidence), pattern };
  }

  /**
   * Leading capital, sane length, and mostly letters.
   */
  private isStoreNameLike(value: string): boolean {
    if (
      value.length < this.config.minLength ||
      value.length > this.config.maxLength
    ) {
      return false;
    }
    if (!/^\p{Lu}/u.test(value)) {
      return false;
    }

    const chars = Array.from(value.replace(/\s+/g, ''));
    const letters = chars.filter((c) => /\p{L}/u.test(c)).length;
    if (letters < 2) {
      return false;
    }

    const noise = chars.filter((c) => !NAME_CHARACTER.test(c)).length;
    return noise / chars.length <= this.config.maxSymbolRatio;
  }
}

// ============================================
// Helpers
// ============================================

/**
 * Clean up vendor name.
 */
export function cleanVendorName(name: string): string {
  return (
    name
      .trim()
      // Remove multiple spaces
      .replace(/\s+/g, ' ')
      // Remove # and following numbers at end (store numbers)
      .replace(/\s*#\s*\d{1,6}$/, '')
      // Remove trailing punctuation
      .replace(/[,.;:!]+$/, '')
      .trim()
  );
}

function isAllCaps(value: string): boolean {
  const letters = value.match(/\p{L}/gu) ?? [];
  return letters.length >= 2 && letters.every((c) => c === c.toUpperCase() && c !== c.toLowerCase());
}

function isTitleCase(value: string): boolean {
  const words = value.split(' ').filter((w) => /\p{L}/u.test(w));
  return (
    words.length > 0 &&
    words.every(
      (word) => /^[^\p{L}]*\p{Lu}/u.test(word) || CONNECTIVES.has(word.toLowerCase())
    )
  );
}
