/**
 * Record Editor
 *
 * The only way to change a record after extraction. A patch is
 * validated, applied to a copy, and the copy is re-checked against the
 * record invariants before it is returned. Corrected fields are trusted
 * fully (confidence 1.0); a cleared field drops to 0.
 */

import { z } from 'zod';

import { InvariantViolationError } from '@/lib/errors';
import { roundCurrency } from '@/lib/utils';
import {
  RECEIPT_CATEGORIES,
  type ReceiptPatch,
  type ReceiptRecord,
} from '@/types/receipt';

import {
  assertRecordInvariants,
  computeOverallConfidence,
  isIsoDate,
} from './record-invariants';

// ============================================
// Schema
// ============================================

const IMMUTABLE_FIELDS = new Set(['id', 'rawText', 'createdAt']);

export const receiptPatchSchema = z
  .object({
    vendor: z.string().trim().min(1).max(200).nullable(),
    transactionDate: z
      .string()
      .refine(isIsoDate, { message: 'Expected a valid YYYY-MM-DD date' })
      .nullable(),
    amount: z.number().finite().nonnegative().nullable(),
    category: z.enum(RECEIPT_CATEGORIES),
  })
  .partial()
  .strict();

// ============================================
// Apply
// ============================================

/**
 * Apply a field-level correction.
 *
 * @returns A new record; the input is not modified
 * @throws InvariantViolationError for immutable or unknown keys and
 *   for values that would break a record invariant
 */
export function applyReceiptPatch(
  record: ReceiptRecord,
  patch: ReceiptPatch,
  now: Date = new Date()
): ReceiptRecord {
  for (const key of Object.keys(patch)) {
    if (IMMUTABLE_FIELDS.has(key)) {
      throw new InvariantViolationError(`Field "${key}" cannot be edited`, key);
    }
  }

  const parsed = receiptPatchSchema.safeParse(patch);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field =
      issue?.code === 'unrecognized_keys'
        ? issue.keys.join(', ')
        : (issue?.path.join('.') ?? 'patch');
    throw new InvariantViolationError(
      `Invalid correction for "${field}": ${issue?.message ?? 'unknown issue'}`,
      field
    );
  }

  const changes = parsed.data;
  const next: ReceiptRecord = {
    ...record,
    confidence: { ...record.confidence },
    updatedAt: now,
  };

  if (changes.vendor !== undefined) {
    next.vendor = changes.vendor;
    next.confidence.vendor = changes.vendor === null ? 0 : 1;
  }

  if (changes.transactionDate !== undefined) {
    next.transactionDate = changes.transactionDate;
    next.confidence.date = changes.transactionDate === null ? 0 : 1;
  }

  if (changes.amount !== undefined) {
    next.amount = changes.amount === null ? null : roundCurrency(changes.amount);
    next.confidence.amount = changes.amount === null ? 0 : 1;
  }

  if (changes.category !== undefined) {
    next.category = changes.category;
    next.confidence.category = 1;
    next.source = 'manually-labeled';
  }

  next.overallConfidence = computeOverallConfidence(next.confidence);

  assertRecordInvariants(next);
  return next;
}
