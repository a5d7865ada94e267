#!/usr/bin/env tsx
/**
 * Export Failures Script
 *
 * Writes the identifiers recorded as failed to a new ledger file, one per
 * line. Point LEDGER_FILE (and a fresh DATA_DIR) at it to retry them as a
 * separate job.
 *
 * Usage:
 *   npm run export-failures -w @retry-runner/scripts -- [--output=PATH]
 *
 * Options:
 *   --output=PATH   Destination ledger (default: <DATA_DIR>/failed_again.txt)
 */

import { join } from 'node:path';

import {
  loadRunnerConfig,
  FileResultStore,
  collectFailedIdentifiers,
  writeLedgerFile,
  createLogger,
} from '@retry-runner/lib';

async function main(): Promise<void> {
  const config = loadRunnerConfig();
  const logger = createLogger('export-failures', {
    level: config.logLevel,
    format: config.logFormat,
  });

  let output = join(config.dataDir, 'failed_again.txt');
  for (const arg of process.argv.slice(2)) {
    if (arg.startsWith('--output=')) {
      output = arg.slice(9);
    }
  }

  try {
    const failed = await collectFailedIdentifiers(new FileResultStore(config.resultsFile));
    await writeLedgerFile(output, failed);
    logger.info(`Exported ${failed.length} failed identifier(s)`, { output });
  } catch (error) {
    logger.error('Export failed', error);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
