#!/usr/bin/env tsx
/**
 * Reset Job Script
 *
 * Deletes the result store and then the checkpoint so the next execution
 * starts from the first ledger entry. Nothing resets implicitly; this is the
 * only way. If a reset is interrupted, run it again.
 *
 * Usage:
 *   npm run reset-job -w @retry-runner/scripts -- --yes
 */

import {
  loadRunnerConfig,
  FileCheckpointStore,
  FileResultStore,
  FileLease,
  withLease,
  resetJob,
  createLogger,
} from '@retry-runner/lib';

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const config = loadRunnerConfig();
  const logger = createLogger('reset-job', { level: config.logLevel, format: config.logFormat });

  if (!args.includes('--yes')) {
    logger.error('Refusing to reset without --yes', {
      checkpointFile: config.checkpointFile,
      resultsFile: config.resultsFile,
    });
    process.exit(1);
  }

  try {
    // Never reset underneath a running execution
    await withLease(new FileLease(config.leaseFile, { ttlMs: config.leaseTtlMs }), async () => {
      await resetJob(
        new FileCheckpointStore(config.checkpointFile),
        new FileResultStore(config.resultsFile)
      );
    });
    logger.info('Job reset', {
      checkpointFile: config.checkpointFile,
      resultsFile: config.resultsFile,
    });
  } catch (error) {
    logger.error('Reset failed', error);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
