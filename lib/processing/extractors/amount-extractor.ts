/**
 * Amount Extractor
 *
 * Finds the receipt total. Lines carrying a total keyword are preferred
 * and, among those, the largest line-tail value wins. Without any total
 * line the largest money-looking number in the text is used at low
 * confidence.
 *
 * A number counts as money when it has a cents part or a currency
 * symbol, so dates, times, quantities and percentages are ignored. The
 * one exception is a bare integer closing a total line ("TOTAL 45").
 */

import { escapeRegExp, roundConfidence, roundCurrency } from '@/lib/utils';

import {
  DEFAULT_EXTRACTION_CONFIG,
  type AmountExtractionConfig,
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

interface MoneyToken {
  value: number;
  hasCurrency: boolean;
}

interface AmountCandidate extends MoneyToken {
  confidence: number;
  source: string;
  line: number;
}

type TotalLineKind = 'strong' | 'plain';

// ============================================
// Constants
// ============================================

/**
 * Money token: optional symbol or code, grouped or plain integer part,
 * optional 1-2 digit decimals. Not part of a longer number, a date or a
 * percentage.
 */
const MONEY_TOKEN =
  /(?<![\p{L}\p{N}.,])([$€£¥]|USD|EUR|GBP|CAD|AUD|INR)?\s?(\d{1,3}(?:,\d{3})+|\d+)(?:\.(\d{1,2}))?(?![\d,%]|\.\d)/gu;

/** Bare integer closing a total line, e.g. "TOTAL 45". Not a time or date part. */
const LINE_TAIL_INTEGER = /(?<![\p{L}\p{N}.,:/-])(\d{1,3}(?:,\d{3})+|\d+)\s*$/u;

const STRONG_TOTAL_CONFIDENCE = 0.95;
const TOTAL_CONFIDENCE = 0.9;
const NEXT_LINE_CONFIDENCE = 0.8;
const FALLBACK_CONFIDENCE = 0.5;
const CURRENCY_BOOST = 0.05;

function keywordPattern(keywords: readonly string[]): RegExp | null {
  if (keywords.length === 0) {
    return null;
  }
  return new RegExp(
    `(?<!\\p{L})(?:${keywords.map(escapeRegExp).join('|')})(?!\\p{L})`,
    'iu'
  );
}

// ============================================
// AmountExtractor Class
// ============================================

export class AmountExtractor implements FieldExtractor<number> {
  readonly field = 'amount' as const;

  private readonly strongPattern: RegExp | null;
  private readonly totalPattern: RegExp | null;
  private readonly subtotalPattern: RegExp | null;

  constructor(config: AmountExtractionConfig = DEFAULT_EXTRACTION_CONFIG.amount) {
    this.strongPattern = keywordPattern(config.strongTotalKeywords);
    this.totalPattern = keywordPattern(config.totalKeywords);
    this.subtotalPattern = keywordPattern(config.subtotalKeywords);
  }

  extract(text: string): FieldExtraction<number> {
    const lines = toLines(text);
    const tokensByLine = lines.map(findMoneyTokens);

    const totals: AmountCandidate[] = [];
    lines.forEach((line, index) => {
      const kind = this.classifyLine(line);
      if (!kind) {
        return;
      }

      const tail = tokensByLine[index]?.at(-1) ?? findLineTailInteger(line);
      if (tail) {
        totals.push({
          ...tail,
          line: index,
          confidence: kind === 'strong' ? STRONG_TOTAL_CONFIDENCE : TOTAL_CONFIDENCE,
          source: kind === 'strong' ? 'Strong total keyword' : 'Total keyword',
        });
        return;
      }

      // "TOTAL" alone on a line, value printed underneath
      const below = tokensByLine[index + 1]?.at(-1);
      if (below) {
        totals.push({
          ...below,
          line: index + 1,
          confidence: NEXT_LINE_CONFIDENCE,
          source: 'Total keyword (next line)',
        });
      }
    });

    const best = pickLargest(totals) ?? this.fallback(tokensByLine);
    if (!best) {
      return emptyExtraction();
    }

    return {
      value: roundCurrency(best.value),
      confidence: roundConfidence(best.confidence + (best.hasCurrency ? CURRENCY_BOOST : 0)),
      source: best.source,
    };
  }

  private classifyLine(line: string): TotalLineKind | null {
    if (this.strongPattern?.test(line)) {
      return 'strong';
    }
    if (this.subtotalPattern?.test(line)) {
      return null;
    }
    if (this.totalPattern?.test(line)) {
      return 'plain';
    }
    return null;
  }

  private fallback(tokensByLine: MoneyToken[][]): AmountCandidate | null {
    const candidates = tokensByLine.flatMap((tokens, line) =>
      tokens.map((token) => ({
        ...token,
        line,
        confidence: FALLBACK_CONFIDENCE,
        source: 'Largest amount',
      }))
    );
    return pickLargest(candidates);
  }
}

// ============================================
// Helpers
// ============================================

/**
 * Bare integer at the end of a line. Only trusted on total lines.
 */
function findLineTailInteger(line: string): MoneyToken | null {
  const integerPart = LINE_TAIL_INTEGER.exec(line)?.[1];
  if (!integerPart) {
    return null;
  }
  const value = parseInt(integerPart.replace(/,/g, ''), 10);
  return Number.isFinite(value) ? { value, hasCurrency: false } : null;
}

/**
 * Money-looking tokens on one line, left to right.
 */
export function findMoneyTokens(line: string): MoneyToken[] {
  const tokens: MoneyToken[] = [];

  for (const match of line.matchAll(MONEY_TOKEN)) {
    const [, symbol, integerPart, decimals] = match;
    if (!integerPart || (!symbol && decimals === undefined)) {
      continue;
    }

    const value = parseFloat(
      `${integerPart.replace(/,/g, '')}${decimals !== undefined ? `.${decimals}` : ''}`
    );
    if (Number.isFinite(value)) {
      tokens.push({ value, hasCurrency: symbol !== undefined });
    }
  }

  return tokens;
}

/**
 * Largest value; ties go to the more confident, then the earlier line.
 */
function pickLargest(candidates: AmountCandidate[]): AmountCandidate | null {
  let best: AmountCandidate | null = null;
  for (const candidate of candidates) {
    if (
      !best ||
      candidate.value > best.value ||
      (candidate.value === best.value && candidate.confidence > best.confidence)
    ) {
      best = candidate;
    }
  }
  return best;
}
