import { describe, it, expect } from 'vitest';
import { findUnexpectedColumns, partition, sumColumns } from './reconciler';
import { concatFrames, createFrame, frameRows, getColumn } from './frame';
import type { CellValue, TabularFrame } from './frame';
import { MissingColumnError } from './errors';

function fulfillmentLog(ids: string[]): TabularFrame {
  return createFrame(
    ['amazon-order-id', 'merchant-order-id', 'purchase-date'],
    ids.map((id) => [id, `M-${id}`, '2024-11-01']),
    'fulfillment',
  );
}

function transactions(rows: Array<[string | null, string]>): TabularFrame {
  return createFrame(
    ['date/time', 'order id', 'type', 'product sales', 'total'],
    rows.map(([orderId, type], i): CellValue[] => ['11/01/2024', orderId, type, String(i), String(i)]),
    'combined',
  );
}

// =============================================================================
// partition
// =============================================================================

describe('partition', () => {
  it('matches only fulfilled orders of an eligible type', () => {
    const combined = transactions([
      ['111', 'Order'],
      ['333', 'Order'],
      ['222', 'Refund'],
    ]);

    const { matched, unmatched } = partition(combined, fulfillmentLog(['111', '222']));

    expect(getColumn(matched, 'order id')).toEqual(['111']);
    expect(getColumn(unmatched, 'order id')).toEqual(['333', '222']);
  });

  it('is an exhaustive, disjoint, order-preserving partition', () => {
    const combined = transactions([
      ['1', 'Order'],
      [null, 'Service Fee'],
      ['2', 'Order'],
      ['3', 'Refund'],
      ['4', 'Order'],
      ['2', 'Adjustment'],
    ]);

    const { matched, unmatched } = partition(combined, fulfillmentLog(['2', '3', '4']));
    const seen = [...getColumn(matched, 'product sales'), ...getColumn(unmatched, 'product sales')];

    expect(matched.rowCount + unmatched.rowCount).toBe(combined.rowCount);
    expect(getColumn(matched, 'product sales')).toEqual(['2', '4']);
    expect(getColumn(unmatched, 'product sales')).toEqual(['0', '1', '3', '5']);
    expect([...seen].sort()).toEqual(['0', '1', '2', '3', '4', '5']);
    expect(new Set(seen).size).toBe(6);
  });

  it('copies rows instead of sharing column storage', () => {
    const combined = transactions([['111', 'Order']]);
    const { matched } = partition(combined, fulfillmentLog(['111']));

    getColumn(matched, 'type')[0] = 'Changed';

    expect(getColumn(combined, 'type')).toEqual(['Order']);
  });

  it('matches on order id alone when validTypes is "any"', () => {
    const combined = transactions([
      ['111', 'Order'],
      ['222', 'Refund'],
      ['333', 'Order'],
    ]);

    const { matched } = partition(combined, fulfillmentLog(['111', '222']), { validTypes: 'any' });

    expect(frameRows(matched).map((row) => row['order id'])).toEqual(['111', '222']);
  });

  it('never matches a missing order id', () => {
    const combined = transactions([[null, 'Order']]);
    const fulfillment = createFrame(['amazon-order-id', 'x', 'y'], [[null, 'a', 'b']]);

    const { matched, unmatched } = partition(combined, fulfillment);

    expect(matched.rowCount).toBe(0);
    expect(unmatched.rowCount).toBe(1);
  });

  it('throws MissingColumnError naming the absent column', () => {
    const combined = createFrame(['order id', 'total'], [['111', '1']], 'combined');

    expect(() => partition(combined, fulfillmentLog(['111']))).toThrow(MissingColumnError);
    expect(() => partition(combined, fulfillmentLog(['111']))).toThrow(
      'Column "type" not found in combined',
    );
  });

  it('throws when the fulfillment log lacks its id column', () => {
    const combined = transactions([['111', 'Order']]);
    const fulfillment = createFrame(['order-id'], [['111']], 'fulfillment');

    expect(() => partition(combined, fulfillment)).toThrow(
      'Column "amazon-order-id" not found in fulfillment',
    );
  });

  it('reports unexpected monetary columns without altering the result', () => {
    const combined = concatFrames([
      transactions([['111', 'Order']]),
      createFrame(['points granted'], [['5']]),
    ]);

    const result = partition(combined, fulfillmentLog(['111']));

    expect(result.unexpectedColumns).toEqual(['points granted']);
    expect(result.matched.rowCount).toBe(1);
  });
});

// =============================================================================
// findUnexpectedColumns
// =============================================================================

describe('findUnexpectedColumns', () => {
  it('lists columns after the anchor outside the known set', () => {
    const frame = createFrame(['type', 'product sales', 'selling fees', 'mystery fee', 'total'], []);
    expect(findUnexpectedColumns(frame)).toEqual(['mystery fee']);
  });

  it('ignores columns before the anchor', () => {
    const frame = createFrame(['mystery', 'product sales', 'total'], []);
    expect(findUnexpectedColumns(frame)).toEqual([]);
  });

  it('returns nothing without the anchor', () => {
    const frame = createFrame(['type', 'mystery'], []);
    expect(findUnexpectedColumns(frame)).toEqual([]);
  });
});

// =============================================================================
// sumColumns
// =============================================================================

describe('sumColumns', () => {
  it('sums coerced values and reports missing columns', () => {
    const frame = createFrame(
      ['product sales', 'total'],
      [
        ['1,234.50', '10'],
        ['N/A', '2.5'],
        [null, 5],
      ],
    );

    const { totals, missing } = sumColumns(frame, ['product sales', 'total', 'fba fees']);

    expect(totals).toEqual({ 'product sales': 1234.5, total: 17.5, 'fba fees': 0 });
    expect(missing).toEqual(['fba fees']);
  });
});
