/**
 * Configuration loading for the reconciler
 *
 * Loads `.env` from the working directory, then an optional JSON file
 * (RECON_CONFIG_PATH, default ./recon.config.json) merged over the defaults,
 * then environment overrides. The result is validated with zod.
 */

import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { createLogger } from './logger';

const logger = createLogger('config');

dotenvConfig();

const conventionSchema = z
  .object({
    headerMarker: z.string().min(1),
    dateColumn: z.string().min(1),
    orderIdColumn: z.string().min(1),
    typeColumn: z.string().min(1),
    fulfillmentColumn: z.string().min(1),
    descriptionColumn: z.string().min(1),
    fulfillmentIdColumn: z.string().min(1),
    fulfillmentDateIndex: z.coerce.number().int().min(0),
    monetaryAnchor: z.string().min(1),
    monetaryColumns: z.array(z.string().min(1)).min(1),
    groupKeys: z.array(z.string().min(1)).min(1),
    itemTypes: z.array(z.string()),
    matchedTypes: z.array(z.string()).min(1),
    nonOrderExcludedTypes: z.array(z.string()),
  })
  .partial()
  .strict();

const configSchema = z.object({
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  outputDir: z.string().min(1).default('./output'),
  /** Accountant's P&L workbook; the bundled template is used when unset */
  templatePath: z.string().min(1).optional(),
  detailSheetName: z.string().min(1).max(31).default('Transaction Detail'),
  nonOrderSheetName: z.string().min(1).max(31).default('Non-Order Transactions'),
  convention: conventionSchema.default({}),
});

export type AppConfig = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG_FILE = 'recon.config.json';

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.RECON_CONFIG_PATH?.trim();
  return resolve(override || DEFAULT_CONFIG_FILE);
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) return {};

  const content = readFileSync(configPath, 'utf-8');
  const parsed: unknown = JSON.parse(content);
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`Config file ${configPath} must contain a JSON object`);
  }
  return { ...parsed };
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (env.LOG_LEVEL) overrides.logLevel = env.LOG_LEVEL;
  if (env.RECON_OUTPUT_DIR) overrides.outputDir = env.RECON_OUTPUT_DIR;
  if (env.RECON_TEMPLATE_PATH) overrides.templatePath = env.RECON_TEMPLATE_PATH;
  return overrides;
}

/**
 * Load configuration from file and environment.
 *
 * @throws ZodError naming the offending field when validation fails
 */
export function loadConfig(
  customPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  const configPath = customPath ? resolve(customPath) : resolveConfigPath(env);
  const fileConfig = readConfigFile(configPath);

  const config = configSchema.parse({ ...fileConfig, ...envOverrides(env) });
  logger.debug({ configPath, outputDir: config.outputDir }, 'Configuration loaded');
  return config;
}
