/**
 * Report import types
 */

/** Raw report content: file bytes or already-decoded text */
export type ReportSource = Uint8Array | string;

export type Delimiter = ',' | '\t' | ';' | '|';

export interface ReadOptions {
  /** Report name used in log lines and error messages */
  name?: string;
  /**
   * Force a delimiter instead of detecting one. Any single character is
   * accepted here; detection only chooses among the `Delimiter` candidates.
   */
  delimiter?: string;
}

export interface HeaderReadOptions extends ReadOptions {
  /** Case-insensitive substring that identifies the header line */
  marker?: string;
}
