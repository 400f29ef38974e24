/**
 * Record invariant checks, run by the extraction coordinator before a
 * record is handed out and by the record editor after every patch.
 */

import { isExists } from 'date-fns';

import { InvariantViolationError } from '@/lib/errors';
import { roundCurrency } from '@/lib/utils';
import { isReceiptCategory } from '@/types/receipt';
import type { ExtractedFieldName, ReceiptRecord } from '@/types/receipt';

const CONFIDENCE_FIELDS: readonly ExtractedFieldName[] = [
  'vendor',
  'date',
  'amount',
  'category',
];

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Weight of each field in the overall confidence.
 */
export const CONFIDENCE_WEIGHTS: Readonly<Record<ExtractedFieldName, number>> =
  Object.freeze({
    vendor: 0.3,
    date: 0.3,
    amount: 0.3,
    category: 0.1,
  });

export function isIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) {
    return false;
  }
  const [, year, month, day] = match;
  return isExists(Number(year), Number(month) - 1, Number(day));
}

function isUnitInterval(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

/**
 * Throws InvariantViolationError on the first broken invariant.
 */
export function assertRecordInvariants(record: ReceiptRecord): void {
  const { amount, transactionDate, vendor } = record;

  if (amount !== null) {
    if (!Number.isFinite(amount) || amount < 0) {
      throw new InvariantViolationError(
        `Amount must be a non-negative number, got ${amount}`,
        'amount'
      );
    }
    if (roundCurrency(amount) !== amount) {
      throw new InvariantViolationError(
        `Amount must be rounded to cents, got ${amount}`,
        'amount'
      );
    }
  }

  if (!isReceiptCategory(record.category)) {
    throw new InvariantViolationError(
      `Unknown category "${String(record.category)}"`,
      'category'
    );
  }

  if (transactionDate !== null && !isIsoDate(transactionDate)) {
    throw new InvariantViolationError(
      `Transaction date must be a valid YYYY-MM-DD date, got "${transactionDate}"`,
      'transactionDate'
    );
  }

  if (vendor !== null && vendor.trim().length === 0) {
    throw new InvariantViolationError('Vendor must not be blank', 'vendor');
  }

  for (const field of CONFIDENCE_FIELDS) {
    if (!isUnitInterval(record.confidence[field])) {
      throw new InvariantViolationError(
        `Confidence for ${field} must be within [0, 1], got ${record.confidence[field]}`,
        `confidence.${field}`
      );
    }
  }

  if (!isUnitInterval(record.overallConfidence)) {
    throw new InvariantViolationError(
      `Overall confidence must be within [0, 1], got ${record.overallConfidence}`,
      'overallConfidence'
    );
  }

  if (record.source === 'manually-labeled' && record.confidence.category !== 1) {
    throw new InvariantViolationError(
      'A manually labeled record must carry category confidence 1.0',
      'confidence.category'
    );
  }
}

/**
 * Weighted summary of the per-field confidences.
 */
export function computeOverallConfidence(
  confidence: Readonly<Record<ExtractedFieldName, number>>
): number {
  const weighted = CONFIDENCE_FIELDS.reduce(
    (sum, field) => sum + confidence[field] * CONFIDENCE_WEIGHTS[field],
    0
  );
  return Math.min(1, Math.round(weighted * 100) / 100);
}

