/**
 * P&L metrics - the channel-level line items of the monthly profit and loss
 * summary, derived from the grouped transaction table.
 *
 * Sales-driven lines are split by fulfillment channel: "Seller" rows are
 * FBM, "Amazon" rows are FBA. Fee lines that Amazon only charges on FBA
 * (storage, inbound freight, liquidations) are taken from the single grouped
 * row that carries them.
 */

import { createLogger } from '../utils/logger';
import { DEFAULT_CONVENTION } from './convention';
import type { ColumnConvention } from './convention';
import { cellText, getColumn, hasColumn } from './frame';
import type { TabularFrame } from './frame';
import { parseMoney } from './normalizer';

const logger = createLogger('pnl-metrics');

// =============================================================================
// TYPES
// =============================================================================

export interface PnLMetrics {
  fbmSales: number;
  fbaSales: number;
  fbmPercentage: number;
  fbaPercentage: number;
  fbmReturns: number;
  fbaReturns: number;
  fbmCommissions: number;
  fbaCommissions: number;
  advertising: number;
  fbaShipping: number;
  fbaInboundFreight: number;
  serviceFeesLessAdvertising: number;
  fbmShippingServices: number;
  fbaAdjustments: number;
  fbaStorageFees: number;
  fbaInventoryFeesOther: number;
  fbaLiquidations: number;
  safeTReimbursement: number;
  fbmPromotionalRebate: number;
  fbaPromotionalRebate: number;
  totalUnaccounted: number;
}

export type PnLMetricName = keyof PnLMetrics;

/** Write order of the summary sheet. */
export const PNL_METRIC_ORDER: PnLMetricName[] = [
  'fbmSales',
  'fbaSales',
  'fbmPercentage',
  'fbaPercentage',
  'fbmReturns',
  'fbaReturns',
  'fbmCommissions',
  'fbaCommissions',
  'advertising',
  'fbaShipping',
  'fbaInboundFreight',
  'serviceFeesLessAdvertising',
  'fbmShippingServices',
  'fbaAdjustments',
  'fbaStorageFees',
  'fbaInventoryFeesOther',
  'fbaLiquidations',
  'safeTReimbursement',
  'fbmPromotionalRebate',
  'fbaPromotionalRebate',
  'totalUnaccounted',
];

export const PNL_METRIC_LABELS: Record<PnLMetricName, string> = {
  fbmSales: 'FBM Sales',
  fbaSales: 'FBA Sales',
  fbmPercentage: 'FBM % of Sales',
  fbaPercentage: 'FBA % of Sales',
  fbmReturns: 'FBM Returns',
  fbaReturns: 'FBA Returns',
  fbmCommissions: 'FBM Commissions',
  fbaCommissions: 'FBA Commissions',
  advertising: 'Advertising',
  fbaShipping: 'FBA Shipping',
  fbaInboundFreight: 'FBA Inbound Freight',
  serviceFeesLessAdvertising: 'Service Fees (less Advertising)',
  fbmShippingServices: 'FBM Shipping Services',
  fbaAdjustments: 'FBA Adjustments',
  fbaStorageFees: 'FBA Storage Fees',
  fbaInventoryFeesOther: 'FBA Inventory Fees (other)',
  fbaLiquidations: 'FBA Liquidations',
  safeTReimbursement: 'SAFE-T Reimbursement',
  fbmPromotionalRebate: 'FBM Promotional Rebates',
  fbaPromotionalRebate: 'FBA Promotional Rebates',
  totalUnaccounted: 'Total Unaccounted',
};

/** Ratio metrics; every other metric is a money amount. */
const RATIO_METRICS = new Set<PnLMetricName>(['fbmPercentage', 'fbaPercentage']);

export function isRatioMetric(name: PnLMetricName): boolean {
  return RATIO_METRICS.has(name);
}

// =============================================================================
// LOOKUP HELPERS
// =============================================================================

const FBM = 'Seller';
const FBA = 'Amazon';

const PRODUCT_SALES = 'product sales';
const SELLING_FEES = 'selling fees';
const FBA_FEES = 'fba fees';
const PROMOTIONAL_REBATES = 'promotional rebates';
const TOTAL = 'total';

interface Criteria {
  type?: string | readonly string[];
  description?: string;
  fulfillment?: string;
}

class GroupedLookup {
  private readonly types: (string | null)[];
  private readonly descriptions: (string | null)[];
  private readonly channels: (string | null)[];

  constructor(
    private readonly frame: TabularFrame,
    convention: ColumnConvention,
  ) {
    this.types = getColumn(frame, convention.typeColumn).map(cellText);
    this.descriptions = getColumn(frame, convention.descriptionColumn).map(cellText);
    this.channels = getColumn(frame, convention.fulfillmentColumn).map(cellText);
  }

  private matches(index: number, criteria: Criteria): boolean {
    const { type, description, fulfillment } = criteria;
    if (type !== undefined) {
      const rowType = this.types[index];
      const accepted = typeof type === 'string' ? [type] : type;
      if (rowType === null || !accepted.includes(rowType)) return false;
    }
    if (description !== undefined && this.descriptions[index] !== description) return false;
    if (fulfillment !== undefined && this.channels[index] !== fulfillment) return false;
    return true;
  }

  private amounts(column: string): number[] {
    if (!hasColumn(this.frame, column)) return [];
    return getColumn(this.frame, column).map((value) => parseMoney(value) ?? 0);
  }

  /** Sum of `column` over matching rows. */
  sum(column: string, criteria: Criteria = {}): number {
    const amounts = this.amounts(column);
    let total = 0;
    for (let i = 0; i < amounts.length; i++) {
      if (this.matches(i, criteria)) total += amounts[i];
    }
    return total;
  }

  /**
   * `column` of the first matching row, 0 when none matches. Later matching
   * rows are ignored.
   */
  firstOrZero(column: string, criteria: Criteria): number {
    const amounts = this.amounts(column);
    for (let i = 0; i < amounts.length; i++) {
      if (this.matches(i, criteria)) return amounts[i];
    }
    return 0;
  }

  countMatches(criteria: Criteria): number {
    let count = 0;
    for (let i = 0; i < this.frame.rowCount; i++) {
      if (this.matches(i, criteria)) count++;
    }
    return count;
  }
}

// =============================================================================
// METRICS
// =============================================================================

const INBOUND_FREIGHT: Criteria = {
  type: 'FBA Inventory Fee',
  description: 'FBA Amazon-Partnered Carrier Shipment Fee',
};
const STORAGE_FEE: Criteria = { type: 'FBA Inventory Fee', description: 'FBA storage fee' };
const LIQUIDATIONS: Criteria = { type: ['Liquidations', 'Liquidations Adjustments'] };
const SAFE_T: Criteria = { type: 'SAFE-T reimbursement' };

const FIRST_OR_ZERO: Array<[PnLMetricName, Criteria]> = [
  ['fbaInboundFreight', INBOUND_FREIGHT],
  ['fbaStorageFees', STORAGE_FEE],
  ['fbaLiquidations', LIQUIDATIONS],
  ['safeTReimbursement', SAFE_T],
];

/**
 * Derive the P&L line items from a table produced by groupAndSum.
 *
 * @throws MissingColumnError when a group-key column is absent
 */
export function computePnLMetrics(
  grouped: TabularFrame,
  convention: ColumnConvention = DEFAULT_CONVENTION,
): PnLMetrics {
  const lookup = new GroupedLookup(grouped, convention);

  for (const [metric, criteria] of FIRST_OR_ZERO) {
    const count = lookup.countMatches(criteria);
    if (count > 1) {
      logger.warn({ metric, rows: count }, 'Several grouped rows match; only the first is used');
    }
  }

  const fbmSales = lookup.sum(PRODUCT_SALES, { type: 'Order', fulfillment: FBM });
  const fbaSales = lookup.sum(PRODUCT_SALES, { type: 'Order', fulfillment: FBA });
  const totalSales = fbmSales + fbaSales;

  const advertising = lookup.sum(TOTAL, { description: 'Cost of Advertising' });
  const fbaInboundFreight = lookup.firstOrZero(TOTAL, INBOUND_FREIGHT);
  const fbaStorageFees = lookup.firstOrZero(TOTAL, STORAGE_FEE);

  const metrics: PnLMetrics = {
    fbmSales,
    fbaSales,
    fbmPercentage: totalSales === 0 ? 0 : fbmSales / totalSales,
    fbaPercentage: totalSales === 0 ? 0 : fbaSales / totalSales,
    fbmReturns: lookup.sum(PRODUCT_SALES, { type: 'Refund', fulfillment: FBM }),
    fbaReturns: lookup.sum(PRODUCT_SALES, { type: 'Refund', fulfillment: FBA }),
    fbmCommissions: lookup.sum(SELLING_FEES, { fulfillment: FBM }),
    fbaCommissions: lookup.sum(SELLING_FEES, { fulfillment: FBA }),
    advertising,
    fbaShipping: lookup.sum(FBA_FEES),
    fbaInboundFreight,
    serviceFeesLessAdvertising: lookup.sum(TOTAL, { type: 'Service Fee' }) - advertising,
    fbmShippingServices: lookup.sum(TOTAL, { type: 'Shipping Services' }),
    fbaAdjustments: lookup.sum(TOTAL, { type: 'Adjustment' }),
    fbaStorageFees,
    fbaInventoryFeesOther:
      lookup.sum(TOTAL, { type: 'FBA Inventory Fee' }) - fbaStorageFees - fbaInboundFreight,
    fbaLiquidations: lookup.firstOrZero(TOTAL, LIQUIDATIONS),
    safeTReimbursement: lookup.firstOrZero(TOTAL, SAFE_T),
    fbmPromotionalRebate: lookup.sum(PROMOTIONAL_REBATES, { fulfillment: FBM }),
    fbaPromotionalRebate: lookup.sum(PROMOTIONAL_REBATES, { fulfillment: FBA }),
    totalUnaccounted: 0,
  };

  const accounted = PNL_METRIC_ORDER.filter(
    (name) => name !== 'totalUnaccounted' && !isRatioMetric(name),
  ).reduce((sum, name) => sum + metrics[name], 0);
  metrics.totalUnaccounted = lookup.sum(TOTAL) - accounted;

  logger.info(
    { fbmSales, fbaSales, totalUnaccounted: metrics.totalUnaccounted },
    'P&L metrics computed',
  );
  return metrics;
}
