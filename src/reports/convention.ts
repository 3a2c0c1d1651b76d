/**
 * Column conventions of Amazon payment reports.
 *
 * Several report columns are located by position or relative position rather
 * than by a stable name: the fulfillment log's purchase date is its third
 * column, and every column from "product sales" rightward in a transaction
 * export is monetary. Those contracts are collected here, under names, so the
 * readers and aggregators never carry bare indexes.
 */

export interface ColumnConvention {
  /** Substring that identifies the header line of a transaction export */
  headerMarker: string;
  /** Transaction date/time column */
  dateColumn: string;
  orderIdColumn: string;
  typeColumn: string;
  fulfillmentColumn: string;
  descriptionColumn: string;
  /** Order id column of the fulfillment log */
  fulfillmentIdColumn: string;
  /** 0-based position of the fulfillment log's date column */
  fulfillmentDateIndex: number;
  /** First monetary column; everything to its right is monetary too */
  monetaryAnchor: string;
  /** Monetary columns the P&L knows how to account for, in report order */
  monetaryColumns: string[];
  /** Ordered grouping key of the aggregated detail table */
  groupKeys: string[];
  /** Types whose per-SKU descriptions collapse into a single "(items)" bucket */
  itemTypes: string[];
  /** Transaction types eligible for fulfillment matching */
  matchedTypes: string[];
  /** Types excluded from the non-order breakdown */
  nonOrderExcludedTypes: string[];
}

export const MONETARY_COLUMNS = [
  'product sales',
  'product sales tax',
  'shipping credits',
  'shipping credits tax',
  'gift wrap credits',
  'giftwrap credits tax',
  'Regulatory Fee',
  'Tax On Regulatory Fee',
  'promotional rebates',
  'promotional rebates tax',
  'marketplace withheld tax',
  'selling fees',
  'fba fees',
  'other transaction fees',
  'other',
  'total',
];

export const ITEMS_DESCRIPTION = '(items)';
export const MISSING_KEY = 'none';

export const DEFAULT_CONVENTION: ColumnConvention = {
  headerMarker: 'date/time',
  dateColumn: 'date/time',
  orderIdColumn: 'order id',
  typeColumn: 'type',
  fulfillmentColumn: 'fulfillment',
  descriptionColumn: 'description',
  fulfillmentIdColumn: 'amazon-order-id',
  fulfillmentDateIndex: 2,
  monetaryAnchor: 'product sales',
  monetaryColumns: [...MONETARY_COLUMNS],
  groupKeys: ['type', 'description', 'fulfillment'],
  itemTypes: ['Order', 'Liquidations', 'Liquidations Adjustments', 'Refund'],
  matchedTypes: ['Order'],
  nonOrderExcludedTypes: ['Transfer', 'Order'],
};

/** The (type, description, fulfillment) key under the convention's column names. */
export function defaultGroupKeys(
  convention: Pick<ColumnConvention, 'typeColumn' | 'descriptionColumn' | 'fulfillmentColumn'>,
): string[] {
  return [convention.typeColumn, convention.descriptionColumn, convention.fulfillmentColumn];
}

/**
 * Overlay partial overrides on the default convention. Unless `groupKeys`
 * is overridden, it follows the resolved type, description and fulfillment
 * column names.
 */
export function resolveConvention(overrides: Partial<ColumnConvention> = {}): ColumnConvention {
  const resolved: ColumnConvention = { ...DEFAULT_CONVENTION };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(resolved, { [key]: value });
    }
  }
  if (overrides.groupKeys === undefined) {
    resolved.groupKeys = defaultGroupKeys(resolved);
  }
  return resolved;
}
