/**
 * Reconciler - split combined transactions into rows that match a fulfilled
 * order and everything else.
 */

import { createLogger } from '../utils/logger';
import { DEFAULT_CONVENTION } from './convention';
import { cellText, getColumn, hasColumn, selectRows } from './frame';
import type { TabularFrame } from './frame';
import { parseMoney } from './normalizer';

const logger = createLogger('reconciler');

// =============================================================================
// TYPES
// =============================================================================

export interface PartitionOptions {
  orderIdColumn?: string;
  fulfillmentIdColumn?: string;
  typeColumn?: string;
  /** Types eligible for matching, or 'any' to match on order id alone */
  validTypes?: ReadonlySet<string> | 'any';
  /** Column after which every column is expected to be a known monetary one */
  anchorColumn?: string;
  knownColumns?: readonly string[];
}

export interface MatchPartition {
  matched: TabularFrame;
  unmatched: TabularFrame;
  /** Columns after the anchor that the P&L does not account for */
  unexpectedColumns: string[];
}

export interface ColumnTotals {
  totals: Record<string, number>;
  /** Requested columns the frame does not have */
  missing: string[];
}

// =============================================================================
// PARTITION
// =============================================================================

/**
 * Columns to the right of `anchor` that are not in `known`. Empty when the
 * frame has no anchor column.
 */
export function findUnexpectedColumns(
  frame: TabularFrame,
  anchor: string = DEFAULT_CONVENTION.monetaryAnchor,
  known: readonly string[] = DEFAULT_CONVENTION.monetaryColumns,
): string[] {
  const start = frame.columns.indexOf(anchor);
  if (start < 0) return [];
  const knownSet = new Set(known);
  return frame.columns.slice(start + 1).filter((column) => !knownSet.has(column));
}

/**
 * Partition `combined` into rows whose order id appears in the fulfillment
 * log (and whose type is eligible) and the rest. Both halves keep input row
 * order, are disjoint, and together contain every row.
 *
 * @throws MissingColumnError when a required column is absent from either frame
 */
export function partition(
  combined: TabularFrame,
  fulfillment: TabularFrame,
  options: PartitionOptions = {},
): MatchPartition {
  const {
    orderIdColumn = DEFAULT_CONVENTION.orderIdColumn,
    fulfillmentIdColumn = DEFAULT_CONVENTION.fulfillmentIdColumn,
    typeColumn = DEFAULT_CONVENTION.typeColumn,
    validTypes = new Set(DEFAULT_CONVENTION.matchedTypes),
    anchorColumn = DEFAULT_CONVENTION.monetaryAnchor,
    knownColumns = DEFAULT_CONVENTION.monetaryColumns,
  } = options;

  const orderIds = getColumn(combined, orderIdColumn);
  const types = validTypes === 'any' ? null : getColumn(combined, typeColumn);
  const fulfilledIds = new Set<string>();
  for (const id of getColumn(fulfillment, fulfillmentIdColumn)) {
    const text = cellText(id);
    if (text !== null) fulfilledIds.add(text);
  }

  const matchedIdx: number[] = [];
  const unmatchedIdx: number[] = [];

  for (let i = 0; i < combined.rowCount; i++) {
    const orderId = cellText(orderIds[i] ?? null);
    const isFulfilled = orderId !== null && fulfilledIds.has(orderId);
    let isEligible = true;
    if (types && validTypes !== 'any') {
      const type = cellText(types[i] ?? null);
      isEligible = type !== null && validTypes.has(type);
    }

    if (isFulfilled && isEligible) matchedIdx.push(i);
    else unmatchedIdx.push(i);
  }

  const unexpectedColumns = findUnexpectedColumns(combined, anchorColumn, knownColumns);
  if (!hasColumn(combined, anchorColumn)) {
    logger.warn({ report: combined.name, anchor: anchorColumn }, 'Monetary anchor column missing');
  } else if (unexpectedColumns.length > 0) {
    logger.warn(
      { report: combined.name, columns: unexpectedColumns },
      `Unexpected columns after '${anchorColumn}' are not accounted for in the calculations`,
    );
  }

  logger.info(
    {
      fulfilledOrders: fulfilledIds.size,
      matched: matchedIdx.length,
      unmatched: unmatchedIdx.length,
    },
    'Transactions partitioned',
  );

  return {
    matched: selectRows(combined, matchedIdx, 'matched transactions'),
    unmatched: selectRows(combined, unmatchedIdx, 'unmatched transactions'),
    unexpectedColumns,
  };
}

// =============================================================================
// COLUMN TOTALS
// =============================================================================

/**
 * Sum each requested column (null and non-numeric cells count as 0).
 * Columns the frame does not have are reported in `missing` and total 0.
 */
export function sumColumns(frame: TabularFrame, columns: readonly string[]): ColumnTotals {
  const totals: Record<string, number> = {};
  const missing: string[] = [];

  for (const column of columns) {
    if (!hasColumn(frame, column)) {
      missing.push(column);
      totals[column] = 0;
      continue;
    }
    totals[column] = getColumn(frame, column).reduce<number>(
      (sum, value) => sum + (parseMoney(value) ?? 0),
      0,
    );
  }

  if (missing.length > 0) {
    logger.warn({ report: frame.name, columns: missing }, 'Columns missing from the report');
  }
  return { totals, missing };
}
