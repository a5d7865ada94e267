/**
 * Runner Configuration
 *
 * File locations and run parameters, read from environment variables.
 * Script flags override what is loaded here.
 */

import { join } from 'node:path';
import { z } from 'zod';
import { LogFormatSchema, LogLevelSchema, parseLogFormat, parseLogLevel } from '../logging/index.js';

const THREE_HOURS_MS = 3 * 60 * 60 * 1000;

export const RunnerConfigSchema = z.object({
  /** Work ledger, one identifier per line */
  ledgerFile: z.string().min(1),

  /** Directory holding checkpoint and results */
  dataDir: z.string().min(1),

  checkpointFile: z.string().min(1),
  resultsFile: z.string().min(1),

  /** Writer lease file, beside the checkpoint */
  leaseFile: z.string().min(1),

  maxItemsPerRun: z.number().int().min(1).default(100),
  flushEvery: z.number().int().min(1).default(5),
  interItemDelayMs: z.number().int().nonnegative().default(1000),
  extractionTimeoutMs: z.number().int().positive().default(90000),

  /** A lease older than this is treated as abandoned */
  leaseTtlMs: z.number().int().positive().default(THREE_HOURS_MS),

  /** Wall-clock estimate per execution, used by status reports */
  hoursPerRun: z.number().positive().default(2.5),

  /** Chromium binary for page extraction; playwright-core's registry when unset */
  browserPath: z.string().min(1).optional(),

  logLevel: LogLevelSchema,
  logFormat: LogFormatSchema,
});

export type RunnerConfig = z.infer<typeof RunnerConfigSchema>;

export type RunnerEnv = Record<string, string | undefined>;

const INTEGER_VARS = [
  'MAX_ITEMS_PER_RUN',
  'FLUSH_EVERY',
  'INTER_ITEM_DELAY_MS',
  'EXTRACTION_TIMEOUT_MS',
  'LEASE_TTL_MS',
] as const;

function readInt(env: RunnerEnv, name: string): number | undefined {
  const raw = env[name];
  return raw ? parseInt(raw, 10) : undefined;
}

function readFloat(env: RunnerEnv, name: string): number | undefined {
  const raw = env[name];
  return raw ? parseFloat(raw) : undefined;
}

/**
 * Environment variables:
 * - LEDGER_FILE (default: failed_urls.txt)
 * - DATA_DIR (default: data)
 * - CHECKPOINT_FILE (default: <DATA_DIR>/retry_checkpoint.json)
 * - RESULTS_FILE (default: <DATA_DIR>/retry_results.json)
 * - LEASE_FILE (default: <DATA_DIR>/retry.lease)
 * - MAX_ITEMS_PER_RUN, FLUSH_EVERY, INTER_ITEM_DELAY_MS, EXTRACTION_TIMEOUT_MS, LEASE_TTL_MS
 * - HOURS_PER_RUN (default: 2.5)
 * - BROWSER_PATH (optional)
 * - LOG_LEVEL (default: info), LOG_FORMAT (default: pretty)
 *
 * @throws {z.ZodError} when a numeric variable does not parse or is out of range
 */
export function loadRunnerConfig(env: RunnerEnv = process.env): RunnerConfig {
  const dataDir = env['DATA_DIR'] || 'data';

  return RunnerConfigSchema.parse({
    ledgerFile: env['LEDGER_FILE'] || 'failed_urls.txt',
    dataDir,
    checkpointFile: env['CHECKPOINT_FILE'] || join(dataDir, 'retry_checkpoint.json'),
    resultsFile: env['RESULTS_FILE'] || join(dataDir, 'retry_results.json'),
    leaseFile: env['LEASE_FILE'] || join(dataDir, 'retry.lease'),
    maxItemsPerRun: readInt(env, 'MAX_ITEMS_PER_RUN'),
    flushEvery: readInt(env, 'FLUSH_EVERY'),
    interItemDelayMs: readInt(env, 'INTER_ITEM_DELAY_MS'),
    extractionTimeoutMs: readInt(env, 'EXTRACTION_TIMEOUT_MS'),
    leaseTtlMs: readInt(env, 'LEASE_TTL_MS'),
    hoursPerRun: readFloat(env, 'HOURS_PER_RUN'),
    browserPath: env['BROWSER_PATH'] || undefined,
    logLevel: parseLogLevel(env['LOG_LEVEL'] ?? 'info'),
    logFormat: parseLogFormat(env['LOG_FORMAT']),
  });
}

/**
 * Checks numeric variables without throwing
 */
export function validateRunnerEnv(env: RunnerEnv = process.env): {
  isValid: boolean;
  warnings: string[];
  errors: string[];
} {
  const warnings: string[] = [];
  const errors: string[] = [];

  for (const name of INTEGER_VARS) {
    const raw = env[name];
    if (!raw) continue;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 0) {
      errors.push(`${name} must be a non-negative integer, got "${raw}"`);
    }
  }

  const hours = env['HOURS_PER_RUN'];
  if (hours) {
    const value = Number(hours);
    if (!Number.isFinite(value) || value <= 0) {
      errors.push(`HOURS_PER_RUN must be a positive number, got "${hours}"`);
    }
  }

  if (env['LOG_FORMAT'] && !LogFormatSchema.safeParse(env['LOG_FORMAT'].trim().toLowerCase()).success) {
    warnings.push(`Unknown LOG_FORMAT "${env['LOG_FORMAT']}", using pretty`);
  }

  if (!env['LEDGER_FILE']) {
    warnings.push('LEDGER_FILE not set, using failed_urls.txt');
  }

  return {
    isValid: errors.length === 0,
    warnings,
    errors,
  };
}
