/**
 * Report export types
 */

export interface CSVOptions {
  delimiter?: string;
  quoteChar?: string;
  includeHeader?: boolean;
}

/** 0-based sheet coordinates */
export interface CellAddress {
  row: number;
  column: number;
}

/**
 * Where the P&L template came from. A bundled template is generated in
 * memory; an external one is an accountant's own workbook with a "Summary"
 * sheet.
 */
export type TemplateSource =
  | { kind: 'bundled' }
  | { kind: 'external'; bytes: Uint8Array };

export type TemplateKind = TemplateSource['kind'];

export interface TemplateLayout {
  kind: TemplateKind;
  sheetName: string;
  /** Cell that receives the report title; bundled layout only */
  titleCell: CellAddress | null;
  /** Column that receives metric labels; external layout only */
  labelColumn: number | null;
  valueColumn: number;
  /** Row of the first metric */
  firstRow: number;
}

export interface WorkbookOptions {
  /** Title written to the layout's title cell */
  title?: string;
  detailSheetName?: string;
}
