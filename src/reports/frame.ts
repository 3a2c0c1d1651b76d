/**
 * TabularFrame - column-oriented table used by every pipeline stage.
 *
 * Columns keep their header order. Each column holds exactly `rowCount`
 * values. Normalization replaces a column in place; every other operation
 * (select, concat, clone) copies so that no two frames share column storage.
 */

import { MissingColumnError } from './errors';

export type CellValue = string | number | Date | null;

export interface TabularFrame {
  /** Report or frame name used in error messages */
  name: string;
  columns: string[];
  rowCount: number;
  data: Map<string, CellValue[]>;
}

export type FrameRow = Record<string, CellValue>;

// =============================================================================
// CONSTRUCTION
// =============================================================================

/**
 * Give repeated header names a numeric suffix: `fee`, `fee.1`, `fee.2`.
 */
export function dedupeColumnNames(headers: string[]): string[] {
  const seen = new Map<string, number>();
  const result: string[] = [];

  for (const header of headers) {
    let candidate = header;
    let count = seen.get(header) ?? 0;
    while (seen.has(candidate)) {
      count++;
      candidate = `${header}.${count}`;
    }
    seen.set(header, count);
    seen.set(candidate, 0);
    result.push(candidate);
  }

  return result;
}

/**
 * Build a frame from a header and row arrays. Short rows are padded with
 * null, surplus cells are dropped.
 */
export function createFrame(
  columns: string[],
  rows: CellValue[][],
  name = 'frame',
): TabularFrame {
  const names = dedupeColumnNames(columns);
  const data = new Map<string, CellValue[]>();

  names.forEach((column, index) => {
    data.set(
      column,
      rows.map((row) => row[index] ?? null),
    );
  });

  return { name, columns: names, rowCount: rows.length, data };
}

export function cloneFrame(frame: TabularFrame, name = frame.name): TabularFrame {
  const data = new Map<string, CellValue[]>();
  for (const column of frame.columns) {
    data.set(column, [...getColumn(frame, column)]);
  }
  return { name, columns: [...frame.columns], rowCount: frame.rowCount, data };
}

// =============================================================================
// COLUMN ACCESS
// =============================================================================

export function hasColumn(frame: TabularFrame, column: string): boolean {
  return frame.data.has(column);
}

export function getColumn(frame: TabularFrame, column: string): CellValue[] {
  const values = frame.data.get(column);
  if (!values) {
    throw new MissingColumnError(column, frame.name);
  }
  return values;
}

/**
 * Replace (or append) a column. The value count must match the frame.
 */
export function setColumn(frame: TabularFrame, column: string, values: CellValue[]): void {
  if (values.length !== frame.rowCount) {
    throw new RangeError(
      `Column "${column}" has ${values.length} values, frame "${frame.name}" has ${frame.rowCount} rows`,
    );
  }
  if (!frame.data.has(column)) {
    frame.columns.push(column);
  }
  frame.data.set(column, values);
}

// =============================================================================
// ROW OPERATIONS
// =============================================================================

/**
 * Copy the rows at the given indices, in the given order.
 */
export function selectRows(
  frame: TabularFrame,
  indices: number[],
  name = frame.name,
): TabularFrame {
  const data = new Map<string, CellValue[]>();
  for (const column of frame.columns) {
    const source = getColumn(frame, column);
    data.set(
      column,
      indices.map((i) => source[i] ?? null),
    );
  }
  return { name, columns: [...frame.columns], rowCount: indices.length, data };
}

/**
 * Copy the rows for which `predicate` returns true.
 */
export function filterRows(
  frame: TabularFrame,
  predicate: (row: FrameRow, index: number) => boolean,
  name = frame.name,
): TabularFrame {
  const indices: number[] = [];
  for (let i = 0; i < frame.rowCount; i++) {
    if (predicate(rowAt(frame, i), i)) indices.push(i);
  }
  return selectRows(frame, indices, name);
}

/**
 * Stack frames vertically. The result has the union of all columns in
 * first-seen order; cells a frame does not have are null.
 */
export function concatFrames(frames: TabularFrame[], name = 'combined'): TabularFrame {
  const columns: string[] = [];
  for (const frame of frames) {
    for (const column of frame.columns) {
      if (!columns.includes(column)) columns.push(column);
    }
  }

  const data = new Map<string, CellValue[]>();
  for (const column of columns) {
    const values: CellValue[] = [];
    for (const frame of frames) {
      const source = frame.data.get(column);
      for (let i = 0; i < frame.rowCount; i++) {
        values.push(source ? source[i] ?? null : null);
      }
    }
    data.set(column, values);
  }

  const rowCount = frames.reduce((sum, frame) => sum + frame.rowCount, 0);
  return { name, columns, rowCount, data };
}

export function rowAt(frame: TabularFrame, index: number): FrameRow {
  const row: FrameRow = {};
  for (const column of frame.columns) {
    row[column] = getColumn(frame, column)[index] ?? null;
  }
  return row;
}

export function frameRows(frame: TabularFrame): FrameRow[] {
  const rows: FrameRow[] = [];
  for (let i = 0; i < frame.rowCount; i++) {
    rows.push(rowAt(frame, i));
  }
  return rows;
}

/**
 * Row-major cell matrix, without the header.
 */
export function frameToMatrix(frame: TabularFrame): CellValue[][] {
  const columns = frame.columns.map((column) => getColumn(frame, column));
  const matrix: CellValue[][] = [];
  for (let i = 0; i < frame.rowCount; i++) {
    matrix.push(columns.map((values) => values[i] ?? null));
  }
  return matrix;
}

/**
 * Text form of a cell for keys and comparisons. Null becomes null.
 */
export function cellText(value: CellValue): string | null {
  if (value === null) return null;
  if (value instanceof Date) return value.toISOString();
  return String(value);
}
