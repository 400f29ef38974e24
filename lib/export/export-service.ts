/**
 * Export Service for receipt-ledger
 *
 * Serializes records for download or hand-off:
 * - CSV (spreadsheet-compatible, one row per record)
 * - JSON (pretty-printed array, ISO timestamps)
 *
 * Raw receipt text is left out unless explicitly requested.
 */

import { InvalidQueryError } from '@/lib/errors';
import type { ReceiptRecord } from '@/types/receipt';

// ============================================
// Types
// ============================================

/**
 * Export format options.
 */
export type ExportFormat = 'csv' | 'json';

export interface ExportOptions {
  /** Include the original receipt text (JSON only) */
  includeRawText?: boolean;

  /** Timestamp used in the filename */
  now?: Date;
}

/**
 * Export result.
 */
export interface ExportResult {
  content: string;
  mimeType: string;
  /** Suggested filename */
  filename: string;
}

/**
 * One record as written to JSON.
 */
export interface ExportedRecord {
  id: string;
  vendor: string | null;
  transactionDate: string | null;
  amount: number | null;
  category: string;
  source: string;
  confidence: ReceiptRecord['confidence'];
  overallConfidence: number;
  createdAt: string;
  updatedAt: string;
  rawText?: string;
}

// ============================================
// Constants
// ============================================

export const CSV_HEADERS = [
  'id',
  'vendor',
  'transaction_date',
  'amount',
  'category',
  'source',
  'vendor_confidence',
  'date_confidence',
  'amount_confidence',
  'category_confidence',
  'overall_confidence',
  'created_at',
] as const;

const MIME_TYPES: Record<ExportFormat, string> = {
  csv: 'text/csv;charset=utf-8',
  json: 'application/json',
};

// ============================================
// Helper Functions
// ============================================

/**
 * Format date for filename.
 */
function formatDateForFilename(date: Date = new Date()): string {
  return date.toISOString().split('T')[0] || 'unknown';
}

/**
 * Escape CSV field value.
 */
export function escapeCSV(value: string | number | null | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }
  const str = String(value);
  // If contains comma, newline, or quote, wrap in quotes and escape internal quotes
  if (str.includes(',') || str.includes('\n') || str.includes('\r') || str.includes('"')) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

function isExportFormat(value: unknown): value is ExportFormat {
  return value === 'csv' || value === 'json';
}

// ============================================
// Export Service Implementation
// ============================================

class ExportService {
  /**
   * Serialize records in the requested format.
   *
   * @throws InvalidQueryError for an unknown format
   */
  exportRecords(
    records: readonly ReceiptRecord[],
    format: ExportFormat,
    options: ExportOptions = {}
  ): ExportResult {
    if (!isExportFormat(format)) {
      throw new InvalidQueryError(`Unsupported export format "${String(format)}"`, 'format');
    }

    const content =
      format === 'csv' ? this.toCSV(records) : this.toJSON(records, options.includeRawText ?? false);

    return {
      content,
      mimeType: MIME_TYPES[format],
      filename: `receipt-ledger-records-${formatDateForFilename(options.now)}.${format}`,
    };
  }

  private toCSV(records: readonly ReceiptRecord[]): string {
    const rows: string[] = [CSV_HEADERS.join(',')];

    for (const record of records) {
      const row = [
        escapeCSV(record.id),
        escapeCSV(record.vendor),
        escapeCSV(record.transactionDate),
        escapeCSV(record.amount === null ? null : record.amount.toFixed(2)),
        escapeCSV(record.category),
        escapeCSV(record.source),
        escapeCSV(record.confidence.vendor),
        escapeCSV(record.confidence.date),
        escapeCSV(record.confidence.amount),
        escapeCSV(record.confidence.category),
        escapeCSV(record.overallConfidence),
        escapeCSV(record.createdAt.toISOString()),
      ];
      rows.push(row.join(','));
    }

    return rows.join('\n');
  }

  private toJSON(records: readonly ReceiptRecord[], includeRawText: boolean): string {
    const exported = records.map((record): ExportedRecord => {
      const entry: ExportedRecord = {
        id: record.id,
        vendor: record.vendor,
        transactionDate: record.transactionDate,
        amount: record.amount,
        category: record.category,
        source: record.source,
        confidence: { ...record.confidence },
        overallConfidence: record.overallConfidence,
        createdAt: record.createdAt.toISOString(),
        updatedAt: record.updatedAt.toISOString(),
      };
      if (includeRawText) {
        entry.rawText = record.rawText;
      }
      return entry;
    });

    return JSON.stringify(exported, null, 2);
  }
}

// ============================================
// Singleton Instance
// ============================================

export const exportService = new ExportService();

/**
 * Convenience function for exporting records.
 */
export function exportRecords(
  records: readonly ReceiptRecord[],
  format: ExportFormat,
  options?: ExportOptions
): ExportResult {
  return exportService.exportRecords(records, format, options);
}
