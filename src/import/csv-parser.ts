/**
 * Report Reader - Parse Amazon report exports into TabularFrames
 *
 * Handles:
 * - UTF-8 BOM stripping
 * - Windows (\r\n) and Unix (\n) line endings
 * - Auto-detection of delimiter (comma, tab, semicolon, pipe)
 * - Quoted fields with embedded delimiters/newlines
 * - Preamble lines before the header (transaction exports start with a
 *   free-text disclaimer; the header is the first line containing "date/time")
 */

import { createLogger } from '../utils/logger';
import { EmptyInputError, HeaderNotFoundError } from '../reports/errors';
import { createFrame } from '../reports/frame';
import type { CellValue, TabularFrame } from '../reports/frame';
import type { Delimiter, HeaderReadOptions, ReadOptions, ReportSource } from './types';

const logger = createLogger('csv-parser');

export const DEFAULT_HEADER_MARKER = 'date/time';

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

/**
 * Decode report bytes as UTF-8, strip a BOM, and normalize line endings.
 */
export function decodeReport(raw: ReportSource): string {
  let data = typeof raw === 'string' ? raw : Buffer.from(raw).toString('utf8');

  // Strip UTF-8 BOM
  if (data.charCodeAt(0) === 0xfeff) {
    data = data.slice(1);
  }

  return data.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}

// ---------------------------------------------------------------------------
// Delimiter detection
// ---------------------------------------------------------------------------

const DELIMITER_CANDIDATES: Delimiter[] = [',', '\t', ';', '|'];

/**
 * Auto-detect delimiter by counting occurrences in the sampled lines.
 * Prefers comma > tab > semicolon > pipe if scores are equal.
 *
 * Only these four are candidates; a report split on any other character is
 * read by passing `delimiter` explicitly.
 */
export function detectDelimiter(sampleLines: string[]): Delimiter {
  const lines = sampleLines.filter((line) => line.trim().length > 0);
  if (lines.length === 0) return ',';

  let bestDelimiter: Delimiter = ',';
  let bestScore = -1;

  for (const delim of DELIMITER_CANDIDATES) {
    // Count how many times each delimiter appears per line, outside quotes
    const counts = lines.map((line) => {
      let count = 0;
      let inQuotes = false;
      for (const ch of line) {
        if (ch === '"') {
          inQuotes = !inQuotes;
        } else if (ch === delim && !inQuotes) {
          count++;
        }
      }
      return count;
    });

    const uniqueCounts = new Set(counts);
    const avgCount = counts.reduce((a, b) => a + b, 0) / counts.length;

    // Score: higher average count + bonus for consistency
    const consistencyBonus = uniqueCounts.size === 1 ? 10 : 0;
    const score = avgCount + consistencyBonus;

    if (score > bestScore && avgCount > 0) {
      bestScore = score;
      bestDelimiter = delim;
    }
  }

  return bestDelimiter;
}

// ---------------------------------------------------------------------------
// Record splitting and field parsing
// ---------------------------------------------------------------------------

/**
 * Split text into records on newlines that are not inside a quoted field.
 * Blank records are dropped.
 */
export function splitRecords(text: string): string[] {
  const records: string[] = [];
  let current = '';
  let inQuotes = false;

  for (const ch of text) {
    if (ch === '"') {
      inQuotes = !inQuotes;
      current += ch;
    } else if (ch === '\n' && !inQuotes) {
      records.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  records.push(current);

  return records.filter((record) => record.trim().length > 0);
}

/**
 * Parse a single record into fields, respecting quoted values.
 * Handles embedded delimiters, newlines within quotes, and escaped quotes ("").
 */
export function parseFields(line: string, delimiter: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;
  let i = 0;

  while (i < line.length) {
    const ch = line[i];

    if (inQuotes) {
      if (ch === '"') {
        // Check for escaped quote ""
        if (i + 1 < line.length && line[i + 1] === '"') {
          current += '"';
          i += 2;
          continue;
        }
        // End of quoted field
        inQuotes = false;
        i++;
        continue;
      }
      current += ch;
      i++;
    } else {
      if (ch === '"' && current.trim().length === 0) {
        current = '';
        inQuotes = true;
        i++;
        continue;
      }
      if (ch === delimiter) {
        fields.push(current.trim());
        current = '';
        i++;
        continue;
      }
      current += ch;
      i++;
    }
  }

  fields.push(current.trim());
  return fields;
}

// ---------------------------------------------------------------------------
// Header search
// ---------------------------------------------------------------------------

/**
 * Index of the first line whose lowercase form contains `marker`
 * (case-insensitive), or -1.
 */
export function locateHeader(lines: string[], marker: string = DEFAULT_HEADER_MARKER): number {
  const needle = marker.toLowerCase();
  return lines.findIndex((line) => line.toLowerCase().includes(needle));
}

// ---------------------------------------------------------------------------
// Frame building
// ---------------------------------------------------------------------------

function toCell(field: string | undefined): CellValue {
  if (field === undefined || field.length === 0) return null;
  return field;
}

function explicitDelimiter(delimiter: string | undefined): string | undefined {
  if (delimiter !== undefined && delimiter.length !== 1) {
    throw new RangeError(`delimiter must be a single character, got "${delimiter}"`);
  }
  return delimiter;
}

function buildFrame(records: string[], delimiter: string, name: string): TabularFrame {
  const header = parseFields(records[0], delimiter);
  const rows: CellValue[][] = [];
  let surplusRows = 0;

  for (let i = 1; i < records.length; i++) {
    const fields = parseFields(records[i], delimiter);

    // Skip completely empty rows
    if (fields.every((f) => f.length === 0)) continue;

    if (fields.length > header.length) surplusRows++;
    rows.push(header.map((_, index) => toCell(fields[index])));
  }

  if (surplusRows > 0) {
    logger.warn(
      { report: name, rows: surplusRows, columns: header.length },
      'Rows with more fields than the header; surplus fields dropped',
    );
  }

  if (rows.length === 0) {
    throw new EmptyInputError(name);
  }

  const frame = createFrame(header, rows, name);
  logger.info(
    {
      report: name,
      delimiter: delimiter === '\t' ? 'tab' : delimiter,
      columns: frame.columns.length,
      rows: frame.rowCount,
    },
    'Report parsed',
  );
  return frame;
}

/**
 * Read a report whose header follows an unknown number of preamble lines.
 *
 * The header is the first line containing `marker`; the delimiter is
 * detected from the header line and the first data line.
 *
 * @throws HeaderNotFoundError when no line contains the marker
 * @throws EmptyInputError when no data rows follow the header
 */
export function readReport(raw: ReportSource, options: HeaderReadOptions = {}): TabularFrame {
  const { marker = DEFAULT_HEADER_MARKER, name = 'report' } = options;
  const records = splitRecords(decodeReport(raw));

  const headerIndex = locateHeader(records, marker);
  if (headerIndex < 0) {
    throw new HeaderNotFoundError(marker, name);
  }
  if (headerIndex > 0) {
    logger.debug({ report: name, skipped: headerIndex }, 'Skipped preamble lines');
  }

  const body = records.slice(headerIndex);
  const delimiter = explicitDelimiter(options.delimiter) ?? detectDelimiter(body.slice(0, 2));
  return buildFrame(body, delimiter, name);
}

/**
 * Read a well-formed delimited report whose first record is the header.
 *
 * @throws EmptyInputError when the report has no data rows
 */
export function readDelimited(raw: ReportSource, options: ReadOptions = {}): TabularFrame {
  const { name = 'report' } = options;
  const records = splitRecords(decodeReport(raw));
  if (records.length === 0) {
    throw new EmptyInputError(name);
  }

  const delimiter = explicitDelimiter(options.delimiter) ?? detectDelimiter(records.slice(0, 10));
  return buildFrame(records, delimiter, name);
}
