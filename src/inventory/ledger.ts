/**
 * Inventory ledger summary - per-ASIN quantity movements of an inventory
 * ledger export, split into receipts and everything else.
 */

import { createLogger } from '../utils/logger';
import { cellText, createFrame, getColumn } from '../reports/frame';
import type { CellValue, TabularFrame } from '../reports/frame';
import { parseMoney } from '../reports/normalizer';

const logger = createLogger('ledger');

export interface LedgerColumns {
  asin: string;
  msku: string;
  title: string;
  eventType: string;
  quantity: string;
}

export const DEFAULT_LEDGER_COLUMNS: LedgerColumns = {
  asin: 'ASIN',
  msku: 'MSKU',
  title: 'Title',
  eventType: 'Event Type',
  quantity: 'Quantity',
};

export const RECEIPTS_EVENT = 'Receipts';

export const LEDGER_SUMMARY_COLUMNS = [
  'ASIN',
  'Sum_Quantity_Non_Receipts',
  'Sum_Quantity_Receipts',
  'Related_MSKUs',
  'Related_Titles',
];

interface AsinTotals {
  nonReceipts: number | null;
  receipts: number | null;
  mskus: Set<string>;
  titles: Set<string>;
}

function addTo(current: number | null, amount: number): number {
  return (current ?? 0) + amount;
}

/**
 * Summarize a ledger by ASIN, ordered by ASIN.
 *
 * Only ASINs with at least one non-receipt event appear; their receipt sum is
 * null when they have no receipts. Rows without an ASIN are skipped.
 *
 * @throws MissingColumnError when one of the ledger columns is absent
 */
export function summarizeInventoryLedger(
  ledger: TabularFrame,
  columns: LedgerColumns = DEFAULT_LEDGER_COLUMNS,
): TabularFrame {
  const asins = getColumn(ledger, columns.asin);
  const mskus = getColumn(ledger, columns.msku);
  const titles = getColumn(ledger, columns.title);
  const events = getColumn(ledger, columns.eventType);
  const quantities = getColumn(ledger, columns.quantity);

  const byAsin = new Map<string, AsinTotals>();
  let skipped = 0;

  for (let i = 0; i < ledger.rowCount; i++) {
    const asin = cellText(asins[i] ?? null);
    if (asin === null) {
      skipped++;
      continue;
    }

    let totals = byAsin.get(asin);
    if (!totals) {
      totals = { nonReceipts: null, receipts: null, mskus: new Set(), titles: new Set() };
      byAsin.set(asin, totals);
    }

    const quantity = parseMoney(quantities[i] ?? null) ?? 0;
    if (cellText(events[i] ?? null) === RECEIPTS_EVENT) {
      totals.receipts = addTo(totals.receipts, quantity);
    } else {
      totals.nonReceipts = addTo(totals.nonReceipts, quantity);
    }

    const msku = cellText(mskus[i] ?? null);
    if (msku !== null) totals.mskus.add(msku);
    const title = cellText(titles[i] ?? null);
    if (title !== null) totals.titles.add(title);
  }

  if (skipped > 0) {
    logger.warn({ report: ledger.name, rows: skipped }, 'Ledger rows without an ASIN skipped');
  }

  const rows: CellValue[][] = [];
  for (const asin of [...byAsin.keys()].sort()) {
    const totals = byAsin.get(asin);
    if (!totals || totals.nonReceipts === null) continue;
    rows.push([
      asin,
      totals.nonReceipts,
      totals.receipts,
      [...totals.mskus].join(', '),
      [...totals.titles].join(', '),
    ]);
  }

  logger.info({ report: ledger.name, asins: rows.length }, 'Inventory ledger summarized');
  return createFrame(LEDGER_SUMMARY_COLUMNS, rows, 'inventory ledger summary');
}
