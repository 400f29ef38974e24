/**
 * Receipt Extractor for receipt-ledger
 *
 * Runs the normalizer and every field extractor over one raw receipt
 * text and assembles a validated ReceiptRecord.
 *
 * Extraction never fails on bad input: an extractor that finds nothing,
 * or throws, leaves its field absent with zero confidence. A manual
 * category label skips the category extractor entirely.
 */

import { v4 as uuidv4 } from 'uuid';

import { InvariantViolationError } from '@/lib/errors';
import {
  createReceiptId,
  isReceiptCategory,
  type ExtractedFieldName,
  type ReceiptCategory,
  type ReceiptRecord,
} from '@/types/receipt';

import { DEFAULT_EXTRACTION_CONFIG, type ExtractionConfig } from './extraction-config';
import {
  AmountExtractor,
  CategoryExtractor,
  DateExtractor,
  VendorExtractor,
  emptyExtraction,
  type FieldExtraction,
  type FieldExtractor,
} from './extractors';
import { assertRecordInvariants, computeOverallConfidence } from './record-invariants';
import { normalizeText } from './text-normalizer';

// ============================================
// Types
// ============================================

export interface ReceiptExtractorSet {
  vendor: FieldExtractor<string>;
  date: FieldExtractor<string>;
  amount: FieldExtractor<number>;
  category: FieldExtractor<ReceiptCategory>;
}

export interface ReceiptExtractorOptions {
  /** Heuristic tables; ignored for extractors passed in `extractors` */
  config?: ExtractionConfig;

  /** Replace individual extractors */
  extractors?: Partial<ReceiptExtractorSet>;

  /** Clock used for createdAt/updatedAt */
  now?: () => Date;

  /** Id generator */
  generateId?: () => string;
}

/**
 * Create the default extractor set for a config.
 */
export function createExtractorSet(
  config: ExtractionConfig = DEFAULT_EXTRACTION_CONFIG
): ReceiptExtractorSet {
  return {
    vendor: new VendorExtractor(config.vendor),
    date: new DateExtractor(config.date),
    amount: new AmountExtractor(config.amount),
    category: new CategoryExtractor(config.category),
  };
}

// ============================================
// ReceiptExtractor Class
// ============================================

export class ReceiptExtractor {
  private readonly extractors: ReceiptExtractorSet;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: ReceiptExtractorOptions = {}) {
    this.extractors = {
      ...createExtractorSet(options.config),
      ...options.extractors,
    };
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? uuidv4;
  }

  /**
   * Extract a record from raw receipt text.
   *
   * @param rawText - Text straight from OCR or an upload
   * @param manualLabel - User-chosen category; skips category inference
   * @throws InvariantViolationError if `manualLabel` is not a known category
   */
  extract(rawText: string, manualLabel?: string | null): ReceiptRecord {
    const label = resolveManualLabel(manualLabel);
    const text = normalizeText(typeof rawText === 'string' ? rawText : '');

    const vendor = this.runExtractor(this.extractors.vendor, text);
    const date = this.runExtractor(this.extractors.date, text);
    const amount = this.runExtractor(this.extractors.amount, text);

    const category: FieldExtraction<ReceiptCategory> = label
      ? { value: label, confidence: 1, source: 'Manual label' }
      : this.runExtractor(this.extractors.category, text);

    const confidence: Record<ExtractedFieldName, number> = {
      vendor: vendor.value === null ? 0 : vendor.confidence,
      date: date.value === null ? 0 : date.confidence,
      amount: amount.value === null ? 0 : amount.confidence,
      category: category.confidence,
    };

    const timestamp = this.now();
    const record: ReceiptRecord = {
      id: createReceiptId(this.generateId()),
      rawText: typeof rawText === 'string' ? rawText : '',
      vendor: vendor.value,
      transactionDate: date.value,
      amount: amount.value,
      category: category.value ?? 'other',
      confidence,
      overallConfidence: computeOverallConfidence(confidence),
      source: label ? 'manually-labeled' : 'auto-detected',
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    assertRecordInvariants(record);
    return record;
  }

  /**
   * Run one extractor; a throwing or out-of-range extractor degrades
   * to an absent value.
   */
  private runExtractor<T>(
    extractor: FieldExtractor<T>,
    text: string
  ): FieldExtraction<T> {
    try {
      const result = extractor.extract(text);
      if (
        result.value !== null &&
        Number.isFinite(result.confidence) &&
        result.confidence >= 0 &&
        result.confidence <= 1
      ) {
        return result;
      }
      if (result.value !== null) {
        console.warn(
          `[ReceiptExtractor] ${extractor.field} extractor returned confidence ${result.confidence}, discarding value`
        );
      }
    } catch (error) {
      console.warn(`[ReceiptExtractor] ${extractor.field} extractor failed:`, error);
    }
    return emptyExtraction();
  }
}

function resolveManualLabel(label: string | null | undefined): ReceiptCategory | null {
  if (label === undefined || label === null) {
    return null;
  }
  if (!isReceiptCategory(label)) {
    throw new InvariantViolationError(`Unknown category label "${label}"`, 'category');
  }
  return label;
}

// ============================================
// Singleton Instance
// ============================================

export const receiptExtractor = new ReceiptExtractor();

/**
 * Convenience function for extracting a record.
 */
export function extract(rawText: string, manualLabel?: string | null): ReceiptRecord {
  return receiptExtractor.extract(rawText, manualLabel);
}
