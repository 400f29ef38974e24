/**
 * Unit Tests for the Record Editor
 */

import { describe, it, expect } from 'vitest';
import { applyReceiptPatch } from './record-editor';
import { InvariantViolationError } from '@/lib/errors';
import { createReceiptRecord } from '@/tests/factories/receipt';
import type { ReceiptPatch } from '@/types/receipt';

const EDITED_AT = new Date('2024-03-01T09:30:00.000Z');

function baseRecord() {
  return createReceiptRecord({
    vendor: 'WALMART',
    amount: 45.67,
    category: 'groceries',
    confidence: { vendor: 0.95, date: 0.85, amount: 0.95, category: 0.5 },
  });
}

describe('applyReceiptPatch', () => {
  it('corrects a field and trusts it fully', () => {
    const record = baseRecord();
    const edited = applyReceiptPatch(record, { vendor: 'Walmart Supercenter' }, EDITED_AT);

    expect(edited.vendor).toBe('Walmart Supercenter');
    expect(edited.confidence).toEqual({ vendor: 1, date: 0.85, amount: 0.95, category: 0.5 });
    // 0.3 * 1 + 0.3 * 0.85 + 0.3 * 0.95 + 0.1 * 0.5
    expect(edited.overallConfidence).toBe(0.89);
    expect(edited.updatedAt).toBe(EDITED_AT);
    expect(edited.source).toBe('auto-detected');
  });

  it('does not modify the input record', () => {
    const record = baseRecord();
    applyReceiptPatch(record, { amount: 50 }, EDITED_AT);

    expect(record.amount).toBe(45.67);
    expect(record.confidence.amount).toBe(0.95);
  });

  it('marks a category correction as a manual label', () => {
    const edited = applyReceiptPatch(baseRecord(), { category: 'shopping' }, EDITED_AT);

    expect(edited.category).toBe('shopping');
    expect(edited.confidence.category).toBe(1);
    expect(edited.source).toBe('manually-labeled');
  });

  it('rounds amounts to cents', () => {
    expect(applyReceiptPatch(baseRecord(), { amount: 12.3456 }).amount).toBe(12.35);
  });

  it('clears a field with null and drops its confidence', () => {
    const edited = applyReceiptPatch(baseRecord(), { transactionDate: null });

    expect(edited.transactionDate).toBeNull();
    expect(edited.confidence.date).toBe(0);
  });

  it('keeps id, raw text and creation time', () => {
    const record = baseRecord();
    const edited = applyReceiptPatch(record, { vendor: 'Costco' });

    expect(edited.id).toBe(record.id);
    expect(edited.rawText).toBe(record.rawText);
    expect(edited.createdAt).toBe(record.createdAt);
  });

  describe('rejected corrections', () => {
    it('rejects a negative amount', () => {
      expect(() => applyReceiptPatch(baseRecord(), { amount: -1 })).toThrow(
        InvariantViolationError
      );
    });

    it('rejects an unknown category', () => {
      expect(() =>
        applyReceiptPatch(baseRecord(), { category: 'travel' } as unknown as ReceiptPatch)
      ).toThrow(InvariantViolationError);
    });

    it('rejects an impossible date', () => {
      expect(() => applyReceiptPatch(baseRecord(), { transactionDate: '2024-02-30' })).toThrow(
        InvariantViolationError
      );
    });

    it('rejects edits to immutable fields', () => {
      const patch = { vendor: 'Costco', id: 'another-id' };

      expect(() => applyReceiptPatch(baseRecord(), patch)).toThrow(
        'Field "id" cannot be edited'
      );
    });

    it('rejects unknown fields', () => {
      const patch = { vendor: 'Costco', notes: 'bulk run' };

      try {
        applyReceiptPatch(baseRecord(), patch);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(InvariantViolationError);
        expect(error).toMatchObject({ field: 'notes' });
      }
    });
  });
});
