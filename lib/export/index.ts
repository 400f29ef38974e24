/**
 * Export Module for receipt-ledger
 *
 * CSV and JSON serialization of receipt records.
 */

export {
  exportService,
  exportRecords,
  escapeCSV,
  CSV_HEADERS,
  type ExportFormat,
  type ExportOptions,
  type ExportResult,
  type ExportedRecord,
} from './export-service';
