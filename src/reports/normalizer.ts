/**
 * Normalizer - typed coercion of report date and money columns.
 *
 * Coercion is soft: an unparsable cell becomes null and the run continues.
 * Callers get parse counts back and decide whether a column with no valid
 * value at all is fatal.
 */

import { isValid, parse, parseISO } from 'date-fns';
import { createLogger } from '../utils/logger';
import { MissingColumnError } from './errors';
import { DEFAULT_CONVENTION } from './convention';
import { filterRows, getColumn, hasColumn, setColumn } from './frame';
import type { CellValue, TabularFrame } from './frame';

const logger = createLogger('normalizer');

// =============================================================================
// DATES
// =============================================================================

const TIMEZONE_SUFFIX = / [A-Z]{3,4}$/;

/** Formats seen in Amazon transaction exports and fulfillment logs. */
const DATE_FORMATS = [
  'MMM d, yyyy h:mm:ss a',
  'MMM d, yyyy h:mm a',
  'MMM d, yyyy',
  'M/d/yyyy H:mm:ss',
  'M/d/yyyy h:mm:ss a',
  'M/d/yyyy H:mm',
  'M/d/yyyy',
  'yyyy-MM-dd HH:mm:ss',
  'yyyy-MM-dd',
  'd MMM yyyy HH:mm:ss',
  'd MMM yyyy',
];

const ISO_LIKE = /^\d{4}-\d{2}-\d{2}T/;

/**
 * Remove a trailing timezone abbreviation ("... 10:15:00 PST").
 */
export function stripTimezone(text: string): string {
  return text.trim().replace(TIMEZONE_SUFFIX, '');
}

export function parseReportDate(value: CellValue): Date | null {
  if (value === null) return null;
  if (value instanceof Date) return isValid(value) ? value : null;
  if (typeof value === 'number') return null;

  const text = stripTimezone(value);
  if (text.length === 0) return null;

  if (ISO_LIKE.test(text)) {
    const iso = parseISO(text);
    return isValid(iso) ? iso : null;
  }

  const reference = new Date(2000, 0, 1);
  for (const format of DATE_FORMATS) {
    const parsed = parse(text, format, reference);
    if (isValid(parsed)) return parsed;
  }
  return null;
}

export interface DateNormalization {
  frame: TabularFrame;
  column: string;
  parsed: number;
  failed: number;
}

/**
 * Replace `column` with parsed dates (null where unparsable). Empty cells
 * count neither as parsed nor as failed.
 */
export function normalizeDates(frame: TabularFrame, column: string): DateNormalization {
  const values = getColumn(frame, column);
  let parsed = 0;
  let failed = 0;

  const dates = values.map((value) => {
    const date = parseReportDate(value);
    if (date) parsed++;
    else if (value !== null) failed++;
    return date;
  });

  setColumn(frame, column, dates);

  if (failed > 0) {
    logger.warn({ report: frame.name, column, failed, parsed }, 'Unparsable dates set to null');
  }
  return { frame, column, parsed, failed };
}

/**
 * Positional variant of normalizeDates for reports whose date column has no
 * reliable name.
 */
export function normalizeDatesAt(frame: TabularFrame, index: number): DateNormalization {
  const column = frame.columns[index];
  if (column === undefined) {
    throw new MissingColumnError(`#${index + 1} (date)`, frame.name);
  }
  return normalizeDates(frame, column);
}

// =============================================================================
// MONEY
// =============================================================================

/**
 * Coerce a report amount: thousands separators are stripped; anything that is
 * not a finite number afterwards becomes null.
 */
export function parseMoney(value: CellValue): number | null {
  if (value === null || value instanceof Date) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;

  const cleaned = value.replace(/,/g, '').trim();
  if (cleaned.length === 0) return null;

  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Columns from `anchor` rightward, the monetary block of a transaction export.
 */
export function monetaryBlock(
  frame: TabularFrame,
  anchor: string = DEFAULT_CONVENTION.monetaryAnchor,
): string[] {
  const start = frame.columns.indexOf(anchor);
  return start < 0 ? [] : frame.columns.slice(start);
}

/**
 * Coerce every column from `anchor` rightward to numbers in place. Returns
 * the columns that were coerced; an absent anchor coerces nothing.
 */
export function normalizeCurrency(
  frame: TabularFrame,
  anchor: string = DEFAULT_CONVENTION.monetaryAnchor,
): string[] {
  if (!hasColumn(frame, anchor)) {
    logger.warn({ report: frame.name, anchor }, 'Monetary anchor column missing; amounts left as text');
    return [];
  }

  const columns = monetaryBlock(frame, anchor);
  let invalid = 0;

  for (const column of columns) {
    const amounts = getColumn(frame, column).map((value) => {
      const amount = parseMoney(value);
      if (amount === null && value !== null) invalid++;
      return amount;
    });
    setColumn(frame, column, amounts);
  }

  if (invalid > 0) {
    logger.warn({ report: frame.name, invalid }, 'Non-numeric amounts set to null');
  }
  return columns;
}

// =============================================================================
// PERIOD FILTER
// =============================================================================

/**
 * Rows whose date falls in the given month (1-12) and year. The column must
 * already be normalized; rows with a null date are excluded.
 */
export function filterByPeriod(
  frame: TabularFrame,
  month: number,
  year: number,
  column: string = DEFAULT_CONVENTION.dateColumn,
): TabularFrame {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new RangeError(`month must be an integer between 1 and 12, got ${month}`);
  }

  const dates = getColumn(frame, column);
  const filtered = filterRows(frame, (_row, index) => {
    const date = dates[index];
    return date instanceof Date && date.getMonth() + 1 === month && date.getFullYear() === year;
  });

  logger.debug(
    { report: frame.name, month, year, kept: filtered.rowCount, total: frame.rowCount },
    'Filtered rows by period',
  );
  return filtered;
}
