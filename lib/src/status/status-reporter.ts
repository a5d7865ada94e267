/**
 * Status Reporter
 *
 * Pure read of the checkpoint and result stores. Never writes.
 */

import type { CheckpointStore, ResultStore } from '../store/index.js';
import { computeRunSlice } from '../orchestrator/index.js';
import {
  type ProgressSnapshot,
  type SnapshotFormatOptions,
  SnapshotFormatOptionsSchema,
} from './types.js';

function roundOneDecimal(value: number): number {
  return Math.round(value * 10) / 10;
}

export async function report(
  checkpointStore: CheckpointStore,
  resultStore: ResultStore,
  ledgerSize: number,
  maxItemsPerRun: number
): Promise<ProgressSnapshot> {
  if (!Number.isInteger(maxItemsPerRun) || maxItemsPerRun < 1) {
    throw new RangeError(`maxItemsPerRun must be a positive integer, got ${maxItemsPerRun}`);
  }

  const checkpoint = await checkpointStore.load();
  const outcomes = await resultStore.load();

  const processed = new Set(checkpoint.processedIds);
  let succeededCount = 0;
  let failedCount = 0;
  for (const outcome of outcomes) {
    processed.add(outcome.id);
    if (outcome.status === 'succeeded') succeededCount++;
    else failedCount++;
  }

  const remainingCount = Math.max(0, ledgerSize - (checkpoint.lastIndex + 1));
  const percentComplete =
    ledgerSize === 0 ? 100 : roundOneDecimal(((ledgerSize - remainingCount) / ledgerSize) * 100);
  const recorded = succeededCount + failedCount;

  return {
    totalItems: ledgerSize,
    lastIndex: checkpoint.lastIndex,
    updatedAt: checkpoint.updatedAt,
    processedCount: processed.size,
    succeededCount,
    failedCount,
    remainingCount,
    percentComplete,
    estimatedRemainingRuns: Math.ceil(remainingCount / maxItemsPerRun),
    successRate: recorded === 0 ? 0 : roundOneDecimal((succeededCount / recorded) * 100),
    nextSlice: computeRunSlice(checkpoint.lastIndex, ledgerSize - 1, maxItemsPerRun),
  };
}

/**
 * Operator-facing report, one line per figure
 */
export function formatProgressSnapshot(
  snapshot: ProgressSnapshot,
  options: SnapshotFormatOptions = {}
): string {
  const { hoursPerRun, title } = SnapshotFormatOptionsSchema.parse(options);
  const hours = roundOneDecimal(snapshot.estimatedRemainingRuns * hoursPerRun);

  const lines = [
    title,
    '='.repeat(title.length),
    'Checkpoint:',
    `  Last index:     ${snapshot.lastIndex}`,
    `  Updated at:     ${snapshot.updatedAt ?? 'never'}`,
    `  Processed ids:  ${snapshot.processedCount}`,
    'Results:',
    `  Succeeded:      ${snapshot.succeededCount}`,
    `  Failed:         ${snapshot.failedCount}`,
    `  Success rate:   ${snapshot.successRate.toFixed(1)}%`,
    'Remaining:',
    `  Items:          ${snapshot.remainingCount} of ${snapshot.totalItems} (${snapshot.percentComplete.toFixed(1)}% complete)`,
    `  Runs needed:    ${snapshot.estimatedRemainingRuns} (~${hours}h at ${hoursPerRun}h per run)`,
    snapshot.nextSlice
      ? `Next slice:       ${snapshot.nextSlice.start}..${snapshot.nextSlice.end}`
      : 'Next slice:       none (job complete)',
  ];

  return lines.join('\n');
}
