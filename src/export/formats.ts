/**
 * Export Formats - CSV generation and cell formatting helpers
 */

import { frameToMatrix } from '../reports/frame';
import type { CellValue, TabularFrame } from '../reports/frame';
import type { CSVOptions } from './types';

// =============================================================================
// CSV GENERATION
// =============================================================================

type CSVValue = string | number | boolean | Date | null | undefined;

/**
 * Generate a CSV string from headers and rows.
 */
export function generateCSV(
  headers: string[],
  rows: CSVValue[][],
  options: CSVOptions = {},
): string {
  const delimiter = options.delimiter ?? ',';
  const quoteChar = options.quoteChar ?? '"';
  const includeHeader = options.includeHeader ?? true;

  function escapeField(value: CSVValue): string {
    if (value === null || value === undefined) {
      return '';
    }

    const str = value instanceof Date ? formatTimestamp(value) : String(value);

    // Quote if contains delimiter, quote char, or newline
    if (
      str.includes(delimiter) ||
      str.includes(quoteChar) ||
      str.includes('\n') ||
      str.includes('\r')
    ) {
      const escaped = str.split(quoteChar).join(quoteChar + quoteChar);
      return `${quoteChar}${escaped}${quoteChar}`;
    }

    return str;
  }

  const lines: string[] = [];

  if (includeHeader) {
    lines.push(headers.map(escapeField).join(delimiter));
  }

  for (const row of rows) {
    lines.push(row.map(escapeField).join(delimiter));
  }

  return lines.join('\n') + '\n';
}

/**
 * CSV of a whole frame, header first, rows in frame order.
 */
export function frameToCsv(frame: TabularFrame, options: CSVOptions = {}): string {
  return generateCSV(frame.columns, frameToMatrix(frame), options);
}

// =============================================================================
// FORMATTING HELPERS
// =============================================================================

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Local `YYYY-MM-DD HH:mm:ss`, the form report dates are written back in.
 */
export function formatTimestamp(date: Date): string {
  if (isNaN(date.getTime())) return '';
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`
  );
}

/**
 * Format a number as currency (USD).
 */
export function formatCurrency(amount: number | null | undefined): string {
  if (amount === null || amount === undefined || !Number.isFinite(amount)) {
    return '$0.00';
  }
  const abs = Math.abs(amount);
  const formatted = abs.toLocaleString('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  });
  return amount < 0 ? `-$${formatted}` : `$${formatted}`;
}

/**
 * Spreadsheet-safe cell: invalid dates and non-finite numbers become null.
 */
export function toSheetCell(value: CellValue): CellValue {
  if (value instanceof Date) return isNaN(value.getTime()) ? null : value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  return value;
}
