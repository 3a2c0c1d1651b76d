import { describe, it, expect } from 'vitest';
import { computePnLMetrics, PNL_METRIC_LABELS, PNL_METRIC_ORDER } from './pnl-metrics';
import { groupAndSum } from './aggregator';
import { createFrame } from './frame';
import type { CellValue, TabularFrame } from './frame';
import { MONETARY_COLUMNS } from './convention';

const HEADER = [
  'type',
  'description',
  'fulfillment',
  'product sales',
  'promotional rebates',
  'selling fees',
  'fba fees',
  'total',
];

type Row = [string, string, string, number, number, number, number, number];

function grouped(rows: Row[]): TabularFrame {
  return createFrame(HEADER, rows.map((row): CellValue[] => [...row]), 'grouped');
}

// =============================================================================
// computePnLMetrics
// =============================================================================

describe('computePnLMetrics', () => {
  const table = grouped([
    // type, description, fulfillment, sales, rebates, selling, fba, total
    ['Order', '(items)', 'Amazon', 1000, -20, -150, -300, 530],
    ['Order', '(items)', 'Seller', 500, -5, -75, 0, 420],
    ['Refund', '(items)', 'Amazon', -100, 2, 15, 0, -83],
    ['Refund', '(items)', 'Seller', -50, 0, 7.5, 0, -42.5],
    ['Service Fee', 'Cost of Advertising', 'none', 0, 0, 0, 0, -120],
    ['Service Fee', 'Subscription', 'none', 0, 0, 0, 0, -39.99],
    ['FBA Inventory Fee', 'FBA storage fee', 'none', 0, 0, 0, 0, -60],
    ['FBA Inventory Fee', 'FBA Amazon-Partnered Carrier Shipment Fee', 'none', 0, 0, 0, 0, -45],
    ['FBA Inventory Fee', 'FBA Removal Order: Disposal Fee', 'none', 0, 0, 0, 0, -10],
    ['Shipping Services', 'Shipping label purchase', 'none', 0, 0, 0, 0, -30],
    ['Adjustment', 'FBA Inventory Reimbursement', 'Amazon', 0, 0, 0, 0, 25],
    ['Liquidations', '(items)', 'Amazon', 0, 0, 0, 0, 18],
    ['SAFE-T reimbursement', 'Safe-T claim', 'none', 0, 0, 0, 0, 12],
  ]);

  it('splits sales, returns, commissions and rebates by channel', () => {
    const metrics = computePnLMetrics(table);

    expect(metrics.fbaSales).toBe(1000);
    expect(metrics.fbmSales).toBe(500);
    expect(metrics.fbaReturns).toBe(-100);
    expect(metrics.fbmReturns).toBe(-50);
    expect(metrics.fbaCommissions).toBe(-135);
    expect(metrics.fbmCommissions).toBe(-67.5);
    expect(metrics.fbaPromotionalRebate).toBe(-18);
    expect(metrics.fbmPromotionalRebate).toBe(-5);
  });

  it('allocates sales percentages', () => {
    const metrics = computePnLMetrics(table);

    expect(metrics.fbaPercentage).toBeCloseTo(2 / 3, 10);
    expect(metrics.fbmPercentage).toBeCloseTo(1 / 3, 10);
  });

  it('derives fee lines', () => {
    const metrics = computePnLMetrics(table);

    expect(metrics.advertising).toBe(-120);
    expect(metrics.serviceFeesLessAdvertising).toBeCloseTo(-39.99, 10);
    expect(metrics.fbaShipping).toBe(-300);
    expect(metrics.fbaStorageFees).toBe(-60);
    expect(metrics.fbaInboundFreight).toBe(-45);
    expect(metrics.fbaInventoryFeesOther).toBe(-10);
    expect(metrics.fbmShippingServices).toBe(-30);
    expect(metrics.fbaAdjustments).toBe(25);
    expect(metrics.fbaLiquidations).toBe(18);
    expect(metrics.safeTReimbursement).toBe(12);
  });

  it('puts everything not attributed to a line into totalUnaccounted', () => {
    const metrics = computePnLMetrics(table);

    // total column: 530 + 420 - 83 - 42.5 - 120 - 39.99 - 60 - 45 - 10 - 30 + 25 + 18 + 12 = 574.51
    // accounted: sales 1500, returns -150, commissions -202.5, advertising -120,
    // fba shipping -300, inbound -45, service -39.99, shipping services -30,
    // adjustments 25, storage -60, other inventory -10, liquidations 18,
    // safe-t 12, rebates -23 = 574.51
    expect(metrics.totalUnaccounted).toBeCloseTo(0, 8);
  });

  it('returns the whole total as unaccounted when no line applies', () => {
    const metrics = computePnLMetrics(
      grouped([
        ['Transfer', 'To bank', 'none', 0, 0, 0, 0, -400],
        ['Other', 'Misc', 'none', 0, 0, 0, 0, 150],
      ]),
    );

    expect(metrics.totalUnaccounted).toBe(-250);
    expect(metrics.fbaPercentage).toBe(0);
    expect(metrics.fbmPercentage).toBe(0);
  });

  it('gives equal channels an even split', () => {
    const metrics = computePnLMetrics(
      grouped([
        ['Order', '(items)', 'Amazon', 200, 0, 0, 0, 200],
        ['Order', '(items)', 'Seller', 200, 0, 0, 0, 200],
      ]),
    );

    expect(metrics.fbaPercentage).toBe(0.5);
    expect(metrics.fbmPercentage).toBe(0.5);
  });

  it('uses only the first row for first-or-zero lines', () => {
    const metrics = computePnLMetrics(
      grouped([
        ['Liquidations', '(items)', 'Amazon', 0, 0, 0, 0, 40],
        ['Liquidations Adjustments', '(items)', 'Amazon', 0, 0, 0, 0, -4],
      ]),
    );

    expect(metrics.fbaLiquidations).toBe(40);
    expect(metrics.totalUnaccounted).toBe(-4);
  });

  it('defaults absent first-or-zero rows to 0', () => {
    const metrics = computePnLMetrics(grouped([]));

    expect(metrics.fbaStorageFees).toBe(0);
    expect(metrics.fbaInboundFreight).toBe(0);
    expect(metrics.fbaLiquidations).toBe(0);
    expect(metrics.safeTReimbursement).toBe(0);
    expect(metrics.totalUnaccounted).toBe(0);
  });

  it('works on the output of groupAndSum', () => {
    const detail = createFrame(
      ['type', 'description', 'fulfillment', 'product sales', 'total'],
      [
        ['Order', 'Blue Widget', 'Amazon', '1,200.00', '1,000.00'],
        ['Order', 'Red Widget', 'Amazon', '300', '250'],
        ['FBA Inventory Fee', 'FBA storage fee', null, '0', '-12.00'],
      ],
    );

    const metrics = computePnLMetrics(groupAndSum(detail, MONETARY_COLUMNS));

    expect(metrics.fbaSales).toBe(1500);
    expect(metrics.fbaStorageFees).toBe(-12);
    expect(metrics.totalUnaccounted).toBe(-250);
  });
});

describe('PNL_METRIC_ORDER', () => {
  it('lists every labelled metric once', () => {
    expect(new Set(PNL_METRIC_ORDER).size).toBe(PNL_METRIC_ORDER.length);
    expect([...PNL_METRIC_ORDER].sort()).toEqual(Object.keys(PNL_METRIC_LABELS).sort());
  });
});
