/**
 * Receipt Record Types for receipt-ledger
 *
 * A receipt record is the structured result of running the extraction
 * pipeline over one piece of raw receipt/bill text. Records are created
 * by the extraction coordinator and afterwards only changed through the
 * validated patch path in `lib/processing/record-editor.ts`.
 */

// ============================================
// Branded Types for Type Safety
// ============================================

/** Unique identifier for receipt records */
export type ReceiptId = string & { readonly __brand: 'ReceiptId' };

export function createReceiptId(id: string): ReceiptId {
  return id as ReceiptId;
}

// ============================================
// Categories
// ============================================

/**
 * The fixed category enumeration. Order doubles as the tie-break
 * priority used by the category extractor.
 */
export const RECEIPT_CATEGORIES = [
  'groceries',
  'restaurant',
  'transport',
  'entertainment',
  'shopping',
  'utilities',
  'healthcare',
  'other',
] as const;

export type ReceiptCategory = (typeof RECEIPT_CATEGORIES)[number];

const CATEGORY_SET: ReadonlySet<string> = new Set(RECEIPT_CATEGORIES);

/**
 * Type guard for values coming from outside the type system
 * (UI selections, persisted rows).
 */
export function isReceiptCategory(value: unknown): value is ReceiptCategory {
  return typeof value === 'string' && CATEGORY_SET.has(value);
}

// ============================================
// Confidence
// ============================================

/** Fields produced by the field extractors */
export type ExtractedFieldName = 'vendor' | 'date' | 'amount' | 'category';

/** Per-field confidence, each value in [0, 1] */
export type FieldConfidence = Record<ExtractedFieldName, number>;

/**
 * How the category was decided.
 * - auto-detected: inferred by the keyword classifier
 * - manually-labeled: supplied or corrected by a user
 */
export type RecordSource = 'auto-detected' | 'manually-labeled';

// ============================================
// Receipt Record
// ============================================

export interface ReceiptRecord {
  /** Unique identifier (UUID), assigned at creation */
  readonly id: ReceiptId;

  /** Original text the record was extracted from */
  readonly rawText: string;

  /** Vendor/merchant name */
  vendor: string | null;

  /** Transaction date in ISO 8601 format (YYYY-MM-DD) */
  transactionDate: string | null;

  /** Total amount, rounded to cents, never negative */
  amount: number | null;

  category: ReceiptCategory;

  confidence: FieldConfidence;

  /** Weighted summary of the per-field confidences (0-1) */
  overallConfidence: number;

  source: RecordSource;

  readonly createdAt: Date;

  /** Last time a correction was applied */
  updatedAt: Date;
}

/**
 * Field-level correction. Only the mutable fields may appear;
 * `null` clears a field (except category, which always has a value).
 */
export interface ReceiptPatch {
  vendor?: string | null;
  transactionDate?: string | null;
  amount?: number | null;
  category?: ReceiptCategory;
}
