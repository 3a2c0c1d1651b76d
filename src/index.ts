/**
 * Amazon settlement reconciler
 *
 * Reads Seller Central report exports, matches transactions against the
 * fulfillment log, and derives the monthly P&L breakdown.
 */

export { runReconciliation, runOrderMatch, ReconciliationSession, periodLabel } from './pipeline/index';
export type {
  ReconciliationInput,
  RunArtifacts,
  RunResult,
  OrderMatchInput,
  OrderMatchResult,
} from './pipeline/index';

export { readReport, readDelimited, decodeReport, detectDelimiter } from './import/csv-parser';
export type { ReportSource, ReadOptions, HeaderReadOptions } from './import/types';

export {
  createFrame,
  concatFrames,
  cloneFrame,
  getColumn,
  hasColumn,
  frameRows,
} from './reports/frame';
export type { CellValue, TabularFrame, FrameRow } from './reports/frame';

export { DEFAULT_CONVENTION, MONETARY_COLUMNS, resolveConvention } from './reports/convention';
export type { ColumnConvention } from './reports/convention';

export {
  normalizeDates,
  normalizeDatesAt,
  normalizeCurrency,
  filterByPeriod,
  parseReportDate,
  parseMoney,
} from './reports/normalizer';
export { partition, sumColumns, findUnexpectedColumns } from './reports/reconciler';
export type { MatchPartition, PartitionOptions } from './reports/reconciler';
export { groupAndSum, excludeTypes } from './reports/aggregator';
export { computePnLMetrics, PNL_METRIC_ORDER, PNL_METRIC_LABELS } from './reports/pnl-metrics';
export type { PnLMetrics, PnLMetricName } from './reports/pnl-metrics';

export {
  ReportError,
  HeaderNotFoundError,
  MissingColumnError,
  EmptyInputError,
  DateParseError,
  TemplateError,
} from './reports/errors';

export { populateTemplate, buildFrameWorkbook, createBundledTemplate } from './export/workbook';
export { frameToCsv, generateCSV } from './export/formats';
export type { TemplateSource, TemplateLayout } from './export/types';

export { summarizeInventoryLedger } from './inventory/ledger';
export { loadConfig } from './utils/config';
export type { AppConfig } from './utils/config';
