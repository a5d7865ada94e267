/**
 * Status Reporter Types
 */

import { z } from 'zod';
import type { RunSlice } from '../orchestrator/index.js';

/**
 * Read-only view of job progress, derived from persisted state
 */
export interface ProgressSnapshot {
  totalItems: number;
  lastIndex: number;
  updatedAt: string | null;
  /** Distinct ids in the checkpoint or the result store */
  processedCount: number;
  succeededCount: number;
  failedCount: number;
  remainingCount: number;
  /** One decimal; 100 for an empty ledger */
  percentComplete: number;
  estimatedRemainingRuns: number;
  /** Percentage of recorded outcomes that succeeded, one decimal */
  successRate: number;
  /** Slice the next execution would attempt, null when complete */
  nextSlice: RunSlice | null;
}

export const SnapshotFormatOptionsSchema = z.object({
  /** Wall-clock estimate for one execution */
  hoursPerRun: z.number().positive().default(2.5),
  title: z.string().default('Retry job status'),
});
export type SnapshotFormatOptions = z.input<typeof SnapshotFormatOptionsSchema>;
