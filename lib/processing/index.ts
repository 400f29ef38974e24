/**
 * Receipt Processing Module - Barrel Export
 *
 * Text normalization, field extraction and the record correction path.
 */

// ============================================
// Text Normalizer
// ============================================

export { normalizeText, toLines } from './text-normalizer';

// ============================================
// Configuration
// ============================================

export {
  DEFAULT_EXTRACTION_CONFIG,
  DEFAULT_DATE_PATTERNS,
  createExtractionConfig,
  type ExtractionConfig,
  type ExtractionConfigOverrides,
  type VendorExtractionConfig,
  type DateExtractionConfig,
  type AmountExtractionConfig,
  type CategoryExtractionConfig,
  type DatePattern,
  type DateParts,
} from './extraction-config';

// ============================================
// Field Extractors
// ============================================

export {
  VendorExtractor,
  DateExtractor,
  AmountExtractor,
  CategoryExtractor,
  cleanVendorName,
  findMoneyTokens,
  type CategoryScore,
  type FieldExtraction,
  type FieldExtractor,
} from './extractors';

// ============================================
// Receipt Extractor
// ============================================

export {
  ReceiptExtractor,
  receiptExtractor,
  extract,
  createExtractorSet,
  type ReceiptExtractorOptions,
  type ReceiptExtractorSet,
} from './receipt-extractor';

// ============================================
// Record Invariants & Editing
// ============================================

export {
  assertRecordInvariants,
  computeOverallConfidence,
  CONFIDENCE_WEIGHTS,
} from './record-invariants';

export { applyReceiptPatch, receiptPatchSchema } from './record-editor';
