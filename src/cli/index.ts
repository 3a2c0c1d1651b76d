#!/usr/bin/env node
/**
 * amazon-recon CLI
 *
 * Commands:
 * - amazon-recon reconcile  — Reconcile a month of Amazon reports into a P&L
 * - amazon-recon match      — Split a combined transactions CSV by fulfilled order id
 * - amazon-recon ledger     — Summarize an inventory ledger export per ASIN
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { Command } from 'commander';
import { loadConfig } from '../utils/config';
import type { AppConfig } from '../utils/config';
import { logger, setLogLevel } from '../utils/logger';
import { errorMessage } from '../reports/errors';
import { runOrderMatch, runReconciliation } from '../pipeline/index';
import type { TemplateSource } from '../export/types';
import { readDelimited } from '../import/csv-parser';
import { summarizeInventoryLedger } from '../inventory/ledger';
import { frameToCsv } from '../export/formats';
import { formatMetricTable, writeOutput, writeRunArtifacts } from './output';

const program = new Command();

process.on('uncaughtException', (error) => {
  logger.error({ error }, 'Uncaught exception');
  process.exit(1);
});

program
  .name('amazon-recon')
  .description('Reconcile Amazon Seller Central reports into a monthly P&L')
  .version('0.1.0')
  .option('-c, --config <path>', 'Path to a recon.config.json file');

function readInput(path: string): Buffer {
  return readFileSync(resolve(path));
}

function fail(error: unknown): never {
  console.error(`\n  \x1b[31mError:\x1b[0m ${errorMessage(error)}\n`);
  process.exit(1);
}

function currentConfig(): AppConfig {
  const { config } = program.opts<{ config?: string }>();
  const loaded = loadConfig(config);
  setLogLevel(loaded.logLevel);
  return loaded;
}

function parseInteger(value: string, name: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new RangeError(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

// ============================================================================
// reconcile — Full monthly run
// ============================================================================
program
  .command('reconcile')
  .description('Reconcile the fulfillment log against the transaction reports for one month')
  .requiredOption('-m, --month <month>', 'Target month (1-12)')
  .requiredOption('-y, --year <year>', 'Target year')
  .requiredOption('--fulfillment <file>', 'Amazon fulfillment report (tab-delimited)')
  .requiredOption('--unified <file>', 'Unified transaction report CSV')
  .requiredOption('--standard <file>', 'Standard orders deferred transaction report CSV')
  .requiredOption('--invoiced <file>', 'Invoiced orders deferred transaction report CSV')
  .option('-t, --template <file>', 'P&L workbook to fill instead of the bundled template')
  .option('-o, --out <dir>', 'Output directory')
  .action((options: {
    month: string;
    year: string;
    fulfillment: string;
    unified: string;
    standard: string;
    invoiced: string;
    template?: string;
    out?: string;
  }) => {
    try {
      const config = currentConfig();
      const templatePath = options.template ?? config.templatePath;
      const template: TemplateSource = templatePath
        ? { kind: 'external', bytes: readInput(templatePath) }
        : { kind: 'bundled' };

      const result = runReconciliation({
        month: parseInteger(options.month, 'month'),
        year: parseInteger(options.year, 'year'),
        fulfillment: readInput(options.fulfillment),
        unified: readInput(options.unified),
        standardOrders: readInput(options.standard),
        invoicedOrders: readInput(options.invoiced),
        template,
        convention: config.convention,
        detailSheetName: config.detailSheetName,
        nonOrderSheetName: config.nonOrderSheetName,
      });

      const outDir = resolve(options.out ?? config.outputDir);
      const written = writeRunArtifacts(outDir, result.artifacts);

      console.log(`\n\x1b[1mP&L Summary - ${result.period.label}\x1b[0m\n`);
      for (const line of formatMetricTable(result.metrics)) {
        console.log(`  ${line}`);
      }
      console.log(
        `\n  Matched ${result.matched.rowCount} of ${result.combined.rowCount} transactions`,
      );

      if (result.warnings.length > 0) {
        console.log('\n  \x1b[33mWarnings:\x1b[0m');
        for (const warning of result.warnings) {
          console.log(`    - ${warning}`);
        }
      }

      console.log('\n  Written:');
      for (const path of written) {
        console.log(`    ${path}`);
      }
      console.log('');
    } catch (error) {
      fail(error);
    }
  });

// ============================================================================
// match — Order-id matching of a combined transactions file
// ============================================================================
program
  .command('match')
  .description('Split a combined transactions CSV into fulfilled and unfulfilled orders')
  .requiredOption('--fulfillment <file>', 'Amazon fulfillment report')
  .requiredOption('--combined <file>', 'Combined transactions CSV')
  .option('-o, --out <dir>', 'Output directory')
  .action((options: { fulfillment: string; combined: string; out?: string }) => {
    try {
      const config = currentConfig();
      const result = runOrderMatch({
        fulfillment: readInput(options.fulfillment),
        combined: readInput(options.combined),
        convention: config.convention,
      });

      const outDir = resolve(options.out ?? config.outputDir);
      const matchedPath = writeOutput(outDir, 'matching_transactions.csv', result.matchedCsv);
      const unmatchedPath = writeOutput(outDir, 'non_matching_transactions.csv', result.unmatchedCsv);

      console.log(`\n  Matching:     ${result.matched.rowCount} rows -> ${matchedPath}`);
      console.log(`  Non-matching: ${result.unmatched.rowCount} rows -> ${unmatchedPath}\n`);
    } catch (error) {
      fail(error);
    }
  });

// ============================================================================
// ledger — Inventory ledger summary
// ============================================================================
program
  .command('ledger')
  .argument('<file>', 'Inventory ledger CSV export')
  .description('Summarize quantities, MSKUs and titles per ASIN')
  .option('-o, --out <dir>', 'Output directory')
  .action((file: string, options: { out?: string }) => {
    try {
      const config = currentConfig();
      const ledger = readDelimited(readInput(file), { name: 'Inventory Ledger' });
      const summary = summarizeInventoryLedger(ledger);

      const outDir = resolve(options.out ?? config.outputDir);
      const path = writeOutput(outDir, 'processed_data.csv', frameToCsv(summary));

      console.log(`\n  ${summary.rowCount} ASINs summarized -> ${path}\n`);
    } catch (error) {
      fail(error);
    }
  });

program.parse();
