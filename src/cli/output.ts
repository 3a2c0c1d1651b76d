/**
 * CLI output helpers - metric table rendering and artifact files.
 */

import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { formatCurrency } from '../export/formats';
import { isRatioMetric, PNL_METRIC_LABELS, PNL_METRIC_ORDER } from '../reports/pnl-metrics';
import type { PnLMetrics } from '../reports/pnl-metrics';
import type { RunArtifacts } from '../pipeline/index';

export const ARTIFACT_FILES: Record<keyof RunArtifacts, string> = {
  combinedCsv: 'processed_data.csv',
  matchedCsv: 'matching_transactions.csv',
  unmatchedCsv: 'non_matching_transactions.csv',
  summaryWorkbook: 'pnl_summary.xlsx',
  nonOrderWorkbook: 'non_order_transactions.xlsx',
};

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(2)}%`;
}

/**
 * One line per metric in summary order, labels padded to a common width.
 */
export function formatMetricTable(metrics: PnLMetrics): string[] {
  const width = Math.max(...PNL_METRIC_ORDER.map((name) => PNL_METRIC_LABELS[name].length));
  return PNL_METRIC_ORDER.map((name) => {
    const value = metrics[name];
    const text = isRatioMetric(name) ? formatPercent(value) : formatCurrency(value);
    return `${PNL_METRIC_LABELS[name].padEnd(width)}  ${text.padStart(14)}`;
  });
}

export function ensureDir(dir: string): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

/** Write `content` under `dir`, creating it first. Returns the file path. */
export function writeOutput(dir: string, fileName: string, content: string | Buffer): string {
  ensureDir(dir);
  const path = join(dir, fileName);
  writeFileSync(path, content);
  return path;
}

/** Write every run artifact under its conventional file name. */
export function writeRunArtifacts(dir: string, artifacts: RunArtifacts): string[] {
  const keys: Array<keyof RunArtifacts> = [
    'combinedCsv',
    'matchedCsv',
    'unmatchedCsv',
    'summaryWorkbook',
    'nonOrderWorkbook',
  ];
  return keys.map((key) => writeOutput(dir, ARTIFACT_FILES[key], artifacts[key]));
}
