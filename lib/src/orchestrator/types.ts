/**
 * Batch Orchestrator Types
 */

import { z } from 'zod';
import type { WorkItem } from '../ledger/index.js';
import type { Outcome } from '../store/index.js';

// ============================================================================
// Run Configuration
// ============================================================================

export const RunConfigSchema = z.object({
  /** Upper bound on items attempted in one execution; size it to the time budget */
  maxItemsPerRun: z.number().int().min(1).default(100),
  /** Pending outcomes that trigger a flush */
  flushEvery: z.number().int().min(1).default(5),
  /** Spacing between extraction attempts */
  interItemDelayMs: z.number().int().min(0).default(1000),
  /** Per-item limit; a timed-out item is recorded as failed */
  extractionTimeoutMs: z.number().int().positive().optional(),
});
export type RunConfig = z.infer<typeof RunConfigSchema>;
export type RunConfigInput = z.input<typeof RunConfigSchema>;

export const ExtractionResultSchema = z.object({
  status: z.enum(['succeeded', 'failed']),
  payload: z.record(z.unknown()).nullable(),
  error: z.string().nullable(),
});

// ============================================================================
// Slices and Reports
// ============================================================================

/**
 * Inclusive ledger range attempted by one execution. Derived, never persisted.
 */
export interface RunSlice {
  start: number;
  end: number;
}

export interface RunReport {
  /** null when there was nothing left to do */
  slice: RunSlice | null;
  /** Extraction calls made */
  attempted: number;
  succeeded: number;
  failed: number;
  /** Items skipped because their id was already accounted for */
  skipped: number;
  flushes: number;
  /** Checkpoint index after the run */
  lastIndex: number;
  ledgerSize: number;
  /** Whether another execution must be chained */
  hasMoreWork: boolean;
  durationMs: number;
}

export interface FlushEvent {
  /** Checkpoint index written by this flush */
  lastIndex: number;
  /** Outcomes handed to the result store */
  outcomes: number;
  /** Outcomes the result store actually added */
  appended: number;
}

/**
 * Optional callbacks, invoked synchronously from the run loop
 */
export interface RunEvents {
  onItemStart?: (item: WorkItem) => void;
  onItemComplete?: (item: WorkItem, outcome: Outcome) => void;
  onItemSkipped?: (item: WorkItem) => void;
  onFlush?: (event: FlushEvent) => void;
}

// ============================================================================
// Run Errors
// ============================================================================

export const RunErrorCode = {
  /** Checkpoint or results could not be loaded */
  LOAD_FAILED: 'LOAD_FAILED',
  /** Result store append failed; the checkpoint was not advanced */
  RESULT_APPEND_FAILED: 'RESULT_APPEND_FAILED',
  /** Outcomes were appended but the checkpoint could not be replaced */
  CHECKPOINT_UPDATE_FAILED: 'CHECKPOINT_UPDATE_FAILED',
} as const;

export type RunErrorCode = (typeof RunErrorCode)[keyof typeof RunErrorCode];

/**
 * Thrown when progress can no longer be recorded safely. The run stops
 * without declaring success; `lastDurableIndex` is the resume point.
 */
export class RunAbortedError extends Error {
  readonly code: RunErrorCode;
  readonly lastDurableIndex: number | null;
  readonly cause: Error | undefined;

  constructor(
    message: string,
    code: RunErrorCode,
    options: { lastDurableIndex: number | null; cause?: unknown }
  ) {
    super(message);
    this.name = 'RunAbortedError';
    this.code = code;
    this.lastDurableIndex = options.lastDurableIndex;
    this.cause = options.cause instanceof Error ? options.cause : undefined;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RunAbortedError);
    }
  }
}

export function isRunAbortedError(error: unknown): error is RunAbortedError {
  return error instanceof RunAbortedError;
}
