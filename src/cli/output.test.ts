import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { formatMetricTable, formatPercent, writeRunArtifacts } from './output';
import { computePnLMetrics } from '../reports/pnl-metrics';
import { createFrame } from '../reports/frame';

const zero = computePnLMetrics(createFrame(['type', 'description', 'fulfillment'], []));

describe('formatMetricTable', () => {
  it('renders money and ratios in summary order', () => {
    const lines = formatMetricTable({ ...zero, fbmSales: 1234.5, fbaPercentage: 0.75, advertising: -80 });

    expect(lines).toHaveLength(21);
    expect(lines[0]).toBe(`${'FBM Sales'.padEnd(31)}       $1,234.50`);
    expect(lines[3]).toBe(`${'FBA % of Sales'.padEnd(31)}          75.00%`);
    expect(lines[8]).toBe(`${'Advertising'.padEnd(31)}         -$80.00`);
    expect(lines[20]).toMatch(/^Total Unaccounted\s+\$0\.00$/);
  });
});

describe('formatPercent', () => {
  it('uses two decimals', () => {
    expect(formatPercent(1 / 3)).toBe('33.33%');
  });
});

describe('writeRunArtifacts', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'recon-out-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes each artifact under its file name', () => {
    const out = join(dir, 'nested');
    const paths = writeRunArtifacts(out, {
      combinedCsv: 'a\n',
      matchedCsv: 'b\n',
      unmatchedCsv: 'c\n',
      summaryWorkbook: Buffer.from('summary'),
      nonOrderWorkbook: Buffer.from('non-order'),
    });

    expect(paths).toEqual([
      join(out, 'processed_data.csv'),
      join(out, 'matching_transactions.csv'),
      join(out, 'non_matching_transactions.csv'),
      join(out, 'pnl_summary.xlsx'),
      join(out, 'non_order_transactions.xlsx'),
    ]);
    expect(readFileSync(paths[1], 'utf-8')).toBe('b\n');
    expect(readFileSync(paths[4], 'utf-8')).toBe('non-order');
  });
});
