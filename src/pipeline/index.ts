/**
 * Reconciliation pipeline - one run from raw report bytes to artifacts.
 *
 *   read -> normalize -> partition -> group & derive metrics -> write
 *
 * A run is synchronous and either returns a complete RunResult or throws;
 * nothing partial escapes a failed run.
 */

import { createLogger } from '../utils/logger';
import { readDelimited, readReport } from '../import/csv-parser';
import type { ReportSource } from '../import/types';
import { DateParseError } from '../reports/errors';
import { resolveConvention } from '../reports/convention';
import type { ColumnConvention } from '../reports/convention';
import { cloneFrame, concatFrames, hasColumn } from '../reports/frame';
import type { TabularFrame } from '../reports/frame';
import {
  filterByPeriod,
  normalizeCurrency,
  normalizeDates,
  normalizeDatesAt,
} from '../reports/normalizer';
import { partition, sumColumns } from '../reports/reconciler';
import { excludeTypes, groupAndSum } from '../reports/aggregator';
import { computePnLMetrics } from '../reports/pnl-metrics';
import type { PnLMetrics } from '../reports/pnl-metrics';
import { frameToCsv } from '../export/formats';
import { buildFrameWorkbook, DEFAULT_DETAIL_SHEET, populateTemplate } from '../export/workbook';
import type { TemplateSource } from '../export/types';

const logger = createLogger('pipeline');

// =============================================================================
// TYPES
// =============================================================================

export interface ReconciliationInput {
  /** Target month, 1-12 */
  month: number;
  year: number;
  fulfillment: ReportSource;
  unified: ReportSource;
  standardOrders: ReportSource;
  invoicedOrders: ReportSource;
  /** Defaults to the bundled template */
  template?: TemplateSource;
  convention?: Partial<ColumnConvention>;
  detailSheetName?: string;
  nonOrderSheetName?: string;
}

export interface RunArtifacts {
  /** processed_data.csv */
  combinedCsv: string;
  /** matching_transactions.csv */
  matchedCsv: string;
  /** non_matching_transactions.csv */
  unmatchedCsv: string;
  /** Summary sheet + detail sheet */
  summaryWorkbook: Buffer;
  /** Grouped non-order unified transactions of the period */
  nonOrderWorkbook: Buffer;
}

export interface RunResult {
  period: { month: number; year: number; label: string };
  combined: TabularFrame;
  matched: TabularFrame;
  unmatched: TabularFrame;
  /** Matched orders plus the period's non-order unified transactions */
  detail: TabularFrame;
  grouped: TabularFrame;
  nonOrderGrouped: TabularFrame;
  metrics: PnLMetrics;
  /** Column totals of the matched transactions */
  matchedTotals: Record<string, number>;
  warnings: string[];
  artifacts: RunArtifacts;
}

export const NON_ORDER_SHEET = 'Non-Order Transactions';

const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

export function periodLabel(month: number, year: number): string {
  return `${MONTH_NAMES[month - 1]} ${year}`;
}

function validatePeriod(month: number, year: number): void {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new RangeError(`month must be an integer between 1 and 12, got ${month}`);
  }
  if (!Number.isInteger(year) || year < 2000 || year > 2100) {
    throw new RangeError(`year must be an integer between 2000 and 2100, got ${year}`);
  }
}

// =============================================================================
// RUN
// =============================================================================

/**
 * Run the whole pipeline for one period.
 *
 * @throws HeaderNotFoundError, EmptyInputError, MissingColumnError,
 *   DateParseError, TemplateError
 */
export function runReconciliation(input: ReconciliationInput): RunResult {
  const { month, year } = input;
  validatePeriod(month, year);

  const convention = resolveConvention(input.convention);
  const template: TemplateSource = input.template ?? { kind: 'bundled' };
  const label = periodLabel(month, year);
  const warnings: string[] = [];

  logger.info({ period: label, template: template.kind }, 'Reconciliation run started');

  // ---- Read ----
  const fulfillment = readDelimited(input.fulfillment, { name: 'Fulfillment Report' });
  const fulfillmentDates = normalizeDatesAt(fulfillment, convention.fulfillmentDateIndex);
  if (fulfillmentDates.parsed === 0) {
    warnings.push(`No date in fulfillment column "${fulfillmentDates.column}" could be parsed`);
  }

  const headerOptions = { marker: convention.headerMarker };
  const unified = readReport(input.unified, { ...headerOptions, name: 'Unified Transaction Report' });
  const standard = readReport(input.standardOrders, {
    ...headerOptions,
    name: 'Standard Orders Deferred Transaction Report',
  });
  const invoiced = readReport(input.invoicedOrders, {
    ...headerOptions,
    name: 'Invoiced Orders Deferred Transaction Report',
  });

  // ---- Combine & reconcile ----
  const combined = concatFrames([unified, standard, invoiced], 'combined transactions');
  if (!hasColumn(combined, convention.monetaryAnchor)) {
    warnings.push(`Column '${convention.monetaryAnchor}' is missing from the transactions`);
  }
  normalizeCurrency(combined, convention.monetaryAnchor);

  const { matched, unmatched, unexpectedColumns } = partition(combined, fulfillment, {
    orderIdColumn: convention.orderIdColumn,
    fulfillmentIdColumn: convention.fulfillmentIdColumn,
    typeColumn: convention.typeColumn,
    validTypes: new Set(convention.matchedTypes),
    anchorColumn: convention.monetaryAnchor,
    knownColumns: convention.monetaryColumns,
  });
  if (unexpectedColumns.length > 0) {
    warnings.push(
      `Unexpected columns after '${convention.monetaryAnchor}' are not accounted for: ` +
        unexpectedColumns.join(', '),
    );
  }

  const { totals: matchedTotals, missing } = sumColumns(matched, convention.monetaryColumns);
  for (const column of missing) {
    warnings.push(`Column '${column}' is missing from the report`);
  }

  // ---- Non-order transactions of the period ----
  const unifiedDated = cloneFrame(unified, 'unified transactions');
  const dates = normalizeDates(unifiedDated, convention.dateColumn);
  if (dates.parsed === 0) {
    throw new DateParseError(convention.dateColumn, unified.name);
  }
  if (dates.failed > 0) {
    warnings.push(`${dates.failed} unified transaction dates could not be parsed and were skipped`);
  }
  normalizeCurrency(unifiedDated, convention.monetaryAnchor);

  const nonOrderPeriod = excludeTypes(
    filterByPeriod(unifiedDated, month, year, convention.dateColumn),
    convention.nonOrderExcludedTypes,
    convention.typeColumn,
  );
  nonOrderPeriod.name = `non-order transactions ${label}`;

  // ---- Aggregate ----
  const detail = concatFrames([matched, nonOrderPeriod], 'transaction detail');
  const groupOptions = { convention };
  const grouped = groupAndSum(detail, convention.monetaryColumns, convention.groupKeys, groupOptions);
  const metrics = computePnLMetrics(grouped, convention);
  const nonOrderGrouped = groupAndSum(
    nonOrderPeriod,
    convention.monetaryColumns,
    convention.groupKeys,
    groupOptions,
  );

  // ---- Write ----
  const artifacts: RunArtifacts = {
    combinedCsv: frameToCsv(combined),
    matchedCsv: frameToCsv(matched),
    unmatchedCsv: frameToCsv(unmatched),
    summaryWorkbook: populateTemplate(template, metrics, grouped, {
      title: `Amazon P&L Summary - ${label}`,
      detailSheetName: input.detailSheetName ?? DEFAULT_DETAIL_SHEET,
    }),
    nonOrderWorkbook: buildFrameWorkbook(nonOrderGrouped, input.nonOrderSheetName ?? NON_ORDER_SHEET),
  };

  logger.info(
    {
      period: label,
      combined: combined.rowCount,
      matched: matched.rowCount,
      nonOrder: nonOrderPeriod.rowCount,
      groups: grouped.rowCount,
      warnings: warnings.length,
    },
    'Reconciliation run complete',
  );

  return {
    period: { month, year, label },
    combined,
    matched,
    unmatched,
    detail,
    grouped,
    nonOrderGrouped,
    metrics,
    matchedTotals,
    warnings,
    artifacts,
  };
}

// =============================================================================
// ORDER MATCH
// =============================================================================

export interface OrderMatchInput {
  fulfillment: ReportSource;
  /** A combined transactions CSV with its header on the first line */
  combined: ReportSource;
  convention?: Partial<ColumnConvention>;
}

export interface OrderMatchResult {
  matched: TabularFrame;
  unmatched: TabularFrame;
  matchedCsv: string;
  unmatchedCsv: string;
}

/**
 * Split an already combined transactions file on order id alone; the
 * transaction type is not consulted.
 */
export function runOrderMatch(input: OrderMatchInput): OrderMatchResult {
  const convention = resolveConvention(input.convention);
  const fulfillment = readDelimited(input.fulfillment, { name: 'Fulfillment Report' });
  const combined = readDelimited(input.combined, { name: 'Combined Transactions Report' });

  const { matched, unmatched } = partition(combined, fulfillment, {
    orderIdColumn: convention.orderIdColumn,
    fulfillmentIdColumn: convention.fulfillmentIdColumn,
    validTypes: 'any',
    anchorColumn: convention.monetaryAnchor,
    knownColumns: convention.monetaryColumns,
  });

  return {
    matched,
    unmatched,
    matchedCsv: frameToCsv(matched),
    unmatchedCsv: frameToCsv(unmatched),
  };
}

// =============================================================================
// SESSION
// =============================================================================

/**
 * Keeps the last successful run for re-download. A failed run leaves the
 * previous result in place; a successful one replaces it.
 */
export class ReconciliationSession {
  private last: RunResult | null = null;

  get lastResult(): RunResult | null {
    return this.last;
  }

  run(input: ReconciliationInput): RunResult {
    const result = runReconciliation(input);
    this.last = result;
    return result;
  }

  clear(): void {
    this.last = null;
  }
}
