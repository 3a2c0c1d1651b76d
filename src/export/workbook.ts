/**
 * Report Writer - populate the P&L summary workbook.
 *
 * Templates are never modified in place: an external workbook is parsed
 * into a fresh in-memory copy, the bundled one is generated per call, and
 * the result is serialized to a new xlsx buffer.
 */

import * as XLSX from 'xlsx';
import { createLogger } from '../utils/logger';
import { errorMessage, TemplateError } from '../reports/errors';
import { frameToMatrix } from '../reports/frame';
import type { TabularFrame } from '../reports/frame';
import { isRatioMetric, PNL_METRIC_LABELS, PNL_METRIC_ORDER } from '../reports/pnl-metrics';
import type { PnLMetrics } from '../reports/pnl-metrics';
import { toSheetCell } from './formats';
import { BUNDLED_LAYOUT, labelCell, layoutFor, metricCell } from './layouts';
import type { CellAddress, TemplateLayout, TemplateSource, WorkbookOptions } from './types';

const logger = createLogger('workbook');

export const DEFAULT_TITLE = 'Amazon P&L Summary';
export const DEFAULT_DETAIL_SHEET = 'Transaction Detail';

const MONEY_FORMAT = '#,##0.00';
const PERCENT_FORMAT = '0.00%';
const MAX_SHEET_NAME = 31;

// =============================================================================
// CELL HELPERS
// =============================================================================

function writeCell(sheet: XLSX.WorkSheet, address: CellAddress, cell: XLSX.CellObject): void {
  sheet[XLSX.utils.encode_cell({ r: address.row, c: address.column })] = cell;

  const ref = sheet['!ref'];
  const range = ref
    ? XLSX.utils.decode_range(ref)
    : { s: { r: address.row, c: address.column }, e: { r: address.row, c: address.column } };
  range.s.r = Math.min(range.s.r, address.row);
  range.s.c = Math.min(range.s.c, address.column);
  range.e.r = Math.max(range.e.r, address.row);
  range.e.c = Math.max(range.e.c, address.column);
  sheet['!ref'] = XLSX.utils.encode_range(range);
}

function textCell(value: string): XLSX.CellObject {
  return { t: 's', v: value };
}

function numberCell(value: number, format: string): XLSX.CellObject {
  return { t: 'n', v: Number.isFinite(value) ? value : 0, z: format };
}

/**
 * Sheet name not yet used by the workbook, within Excel's 31-char limit.
 */
export function uniqueSheetName(workbook: XLSX.WorkBook, wanted: string): string {
  const base = wanted.slice(0, MAX_SHEET_NAME);
  if (!workbook.SheetNames.includes(base)) return base;

  for (let n = 2; ; n++) {
    const suffix = ` (${n})`;
    const candidate = base.slice(0, MAX_SHEET_NAME - suffix.length) + suffix;
    if (!workbook.SheetNames.includes(candidate)) return candidate;
  }
}

function frameSheet(frame: TabularFrame): XLSX.WorkSheet {
  const rows = frameToMatrix(frame).map((row) => row.map(toSheetCell));
  return XLSX.utils.aoa_to_sheet([frame.columns, ...rows]);
}

function serialize(workbook: XLSX.WorkBook): Buffer {
  const out: Buffer = XLSX.write(workbook, { bookType: 'xlsx', type: 'buffer' });
  return out;
}

// =============================================================================
// TEMPLATES
// =============================================================================

/**
 * The default template: a "Summary" sheet with a title row, a blank row,
 * then one labelled row per metric.
 */
export function createBundledTemplate(): XLSX.WorkBook {
  const layout = BUNDLED_LAYOUT;
  const workbook = XLSX.utils.book_new();
  const sheet = XLSX.utils.aoa_to_sheet([[DEFAULT_TITLE]]);

  for (const metric of PNL_METRIC_ORDER) {
    const { row } = metricCell(layout, metric);
    writeCell(sheet, { row, column: 0 }, textCell(PNL_METRIC_LABELS[metric]));
  }
  sheet['!cols'] = [{ wch: 34 }, { wch: 16 }];

  XLSX.utils.book_append_sheet(workbook, sheet, layout.sheetName);
  return workbook;
}

function loadTemplate(source: TemplateSource): XLSX.WorkBook {
  if (source.kind === 'bundled') return createBundledTemplate();

  try {
    return XLSX.read(Buffer.from(source.bytes), { type: 'buffer' });
  } catch (err) {
    throw new TemplateError(`P&L template could not be read: ${errorMessage(err)}`);
  }
}

// =============================================================================
// POPULATE
// =============================================================================

/**
 * Write the metrics into the template's Summary sheet and append the detail
 * table as a new sheet. The layout follows the template kind.
 *
 * @throws TemplateError when the template cannot be parsed or has no Summary sheet
 */
export function populateTemplate(
  source: TemplateSource,
  metrics: PnLMetrics,
  detail: TabularFrame,
  options: WorkbookOptions = {},
): Buffer {
  const layout: TemplateLayout = layoutFor(source.kind);
  const workbook = loadTemplate(source);

  if (!workbook.SheetNames.includes(layout.sheetName)) {
    throw new TemplateError(`P&L template has no "${layout.sheetName}" sheet`);
  }
  const summary = workbook.Sheets[layout.sheetName];

  if (layout.titleCell) {
    writeCell(summary, layout.titleCell, textCell(options.title ?? DEFAULT_TITLE));
  }

  for (const metric of PNL_METRIC_ORDER) {
    const label = labelCell(layout, metric);
    if (label) writeCell(summary, label, textCell(PNL_METRIC_LABELS[metric]));

    const format = isRatioMetric(metric) ? PERCENT_FORMAT : MONEY_FORMAT;
    writeCell(summary, metricCell(layout, metric), numberCell(metrics[metric], format));
  }

  const detailName = uniqueSheetName(workbook, options.detailSheetName ?? DEFAULT_DETAIL_SHEET);
  XLSX.utils.book_append_sheet(workbook, frameSheet(detail), detailName);

  logger.info(
    { layout: layout.kind, detailSheet: detailName, detailRows: detail.rowCount },
    'P&L workbook populated',
  );
  return serialize(workbook);
}

/**
 * Single-sheet workbook holding a frame.
 */
export function buildFrameWorkbook(frame: TabularFrame, sheetName: string): Buffer {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, frameSheet(frame), uniqueSheetName(workbook, sheetName));
  return serialize(workbook);
}
