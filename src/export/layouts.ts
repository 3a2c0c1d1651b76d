/**
 * Summary sheet layouts.
 *
 * The bundled template starts with a title row and a blank row, then one
 * metric per row: label in column A, value in column B. An accountant's own
 * P&L workbook keeps its heading block in the first rows of "Summary", so
 * the metric block is written further down with its labels inserted beside
 * the values.
 */

import { PNL_METRIC_ORDER } from '../reports/pnl-metrics';
import type { PnLMetricName } from '../reports/pnl-metrics';
import type { CellAddress, TemplateKind, TemplateLayout } from './types';

export const SUMMARY_SHEET = 'Summary';

export const BUNDLED_LAYOUT: TemplateLayout = {
  kind: 'bundled',
  sheetName: SUMMARY_SHEET,
  titleCell: { row: 0, column: 0 },
  labelColumn: null,
  valueColumn: 1,
  firstRow: 2,
};

export const EXTERNAL_LAYOUT: TemplateLayout = {
  kind: 'external',
  sheetName: SUMMARY_SHEET,
  titleCell: null,
  labelColumn: 0,
  valueColumn: 1,
  firstRow: 9,
};

export function layoutFor(kind: TemplateKind): TemplateLayout {
  switch (kind) {
    case 'bundled':
      return BUNDLED_LAYOUT;
    case 'external':
      return EXTERNAL_LAYOUT;
  }
}

export function metricCell(layout: TemplateLayout, metric: PnLMetricName): CellAddress {
  return { row: layout.firstRow + PNL_METRIC_ORDER.indexOf(metric), column: layout.valueColumn };
}

export function labelCell(layout: TemplateLayout, metric: PnLMetricName): CellAddress | null {
  if (layout.labelColumn === null) return null;
  return { row: layout.firstRow + PNL_METRIC_ORDER.indexOf(metric), column: layout.labelColumn };
}
