import { describe, it, expect } from 'vitest';
import { summarizeInventoryLedger } from './ledger';
import { readDelimited } from '../import/csv-parser';
import { frameRows } from '../reports/frame';
import { MissingColumnError } from '../reports/errors';

const LEDGER = [
  'Date,FNSKU,ASIN,MSKU,Title,Event Type,Quantity',
  '11/01/2024,X001,B0002,SKU-B,Desk Lamp,Receipts,20',
  '11/02/2024,X002,B0001,SKU-A1,"Widget, Blue",Shipments,-3',
  '11/03/2024,X002,B0001,SKU-A1,"Widget, Blue",Receipts,10',
  '11/04/2024,X003,B0001,SKU-A2,Widget Blue v2,CustomerReturns,1',
  '11/05/2024,X001,B0002,SKU-B,Desk Lamp,Receipts,5',
  '11/06/2024,X004,B0003,SKU-C,Mug,Adjustments,-2',
  '11/07/2024,X002,B0001,SKU-A1,"Widget, Blue",Shipments,-4',
].join('\n');

describe('summarizeInventoryLedger', () => {
  it('sums receipts and other events per ASIN', () => {
    const summary = summarizeInventoryLedger(readDelimited(LEDGER, { name: 'ledger' }));

    expect(summary.columns).toEqual([
      'ASIN',
      'Sum_Quantity_Non_Receipts',
      'Sum_Quantity_Receipts',
      'Related_MSKUs',
      'Related_Titles',
    ]);
    expect(frameRows(summary)).toEqual([
      {
        ASIN: 'B0001',
        Sum_Quantity_Non_Receipts: -6,
        Sum_Quantity_Receipts: 10,
        Related_MSKUs: 'SKU-A1, SKU-A2',
        Related_Titles: 'Widget, Blue, Widget Blue v2',
      },
      {
        ASIN: 'B0003',
        Sum_Quantity_Non_Receipts: -2,
        Sum_Quantity_Receipts: null,
        Related_MSKUs: 'SKU-C',
        Related_Titles: 'Mug',
      },
    ]);
  });

  it('fails when a ledger column is missing', () => {
    const ledger = readDelimited('ASIN,MSKU,Title,Quantity\nB0001,SKU-A,Widget,1');
    expect(() => summarizeInventoryLedger(ledger)).toThrow(MissingColumnError);
  });
});
