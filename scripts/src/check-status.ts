#!/usr/bin/env tsx
/**
 * Check Status Script
 *
 * Prints progress of the retry job from the persisted checkpoint and
 * results. Reads only; safe to run while an execution is in progress.
 *
 * Usage:
 *   npm run check-status -w @retry-runner/scripts -- [options]
 *
 * Options:
 *   --json          Print the snapshot as JSON
 *   --max-items=N   Items per execution used for the estimate (default: MAX_ITEMS_PER_RUN or 100)
 */

import {
  loadRunnerConfig,
  loadWorkLedger,
  FileCheckpointStore,
  FileResultStore,
  report,
  formatProgressSnapshot,
  createLogger,
} from '@retry-runner/lib';

interface ParsedArgs {
  json: boolean;
  maxItems?: number;
}

function parseArgs(): ParsedArgs {
  const result: ParsedArgs = { json: false };

  for (const arg of process.argv.slice(2)) {
    if (arg === '--json') {
      result.json = true;
    } else if (arg.startsWith('--max-items=')) {
      result.maxItems = parseInt(arg.slice(12), 10);
    } else if (arg === '--help' || arg === '-h') {
      console.log('Usage: npm run check-status -w @retry-runner/scripts -- [--json] [--max-items=N]');
      process.exit(0);
    }
  }

  return result;
}

async function main(): Promise<void> {
  const args = parseArgs();
  const config = loadRunnerConfig();
  const logger = createLogger('check-status', { level: config.logLevel, format: config.logFormat });

  try {
    const ledger = await loadWorkLedger(config.ledgerFile);
    const snapshot = await report(
      new FileCheckpointStore(config.checkpointFile),
      new FileResultStore(config.resultsFile),
      ledger.size,
      args.maxItems ?? config.maxItemsPerRun
    );

    if (args.json) {
      console.log(JSON.stringify(snapshot, null, 2));
    } else {
      console.log(formatProgressSnapshot(snapshot, { hoursPerRun: config.hoursPerRun }));
    }
  } catch (error) {
    logger.error('Could not read job status', error);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
