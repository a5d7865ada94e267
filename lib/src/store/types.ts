/**
 * Checkpoint and Result Store Types
 *
 * In-memory shapes (camelCase) and the persisted JSON layouts
 * (snake_case) of the checkpoint and outcome records, with zod schemas
 * used to validate what is read back from disk.
 */

import { z } from 'zod';

// =============================================================================
// Checkpoint
// =============================================================================

/**
 * Durable marker of how much of the ledger is accounted for.
 *
 * `lastIndex` and `processedIds` only ever grow; see `advanceCheckpoint`.
 */
export interface Checkpoint {
  /** Highest ledger index fully accounted for, -1 when none */
  readonly lastIndex: number;
  /** Identifiers with a recorded outcome (succeeded or failed) */
  readonly processedIds: ReadonlySet<string>;
  /** ISO timestamp of the last update, null before the first one */
  readonly updatedAt: string | null;
}

export const PersistedCheckpointSchema = z.object({
  last_index: z.number().int().min(-1),
  processed_urls: z.array(z.string()),
  timestamp: z.string(),
});
export type PersistedCheckpoint = z.infer<typeof PersistedCheckpointSchema>;

// =============================================================================
// Outcome
// =============================================================================

export const OutcomeStatusSchema = z.enum(['succeeded', 'failed']);
export type OutcomeStatus = z.infer<typeof OutcomeStatusSchema>;

/**
 * Recorded result of attempting one identifier
 */
export interface Outcome {
  readonly id: string;
  readonly status: OutcomeStatus;
  readonly payload: Record<string, unknown> | null;
  readonly error: string | null;
  readonly recordedAt: string;
}

export const PersistedOutcomeSchema = z.object({
  id: z.string(),
  status: OutcomeStatusSchema,
  payload: z.record(z.unknown()).nullable(),
  error: z.string().nullable(),
  recorded_at: z.string().optional(),
});
export type PersistedOutcome = z.infer<typeof PersistedOutcomeSchema>;

export const PersistedOutcomeListSchema = z.array(PersistedOutcomeSchema);

export interface AppendResult {
  /** Outcomes written */
  appended: number;
  /** Outcomes dropped because their id was already recorded */
  duplicates: number;
}

// =============================================================================
// Store Contracts
// =============================================================================

export interface CheckpointStore {
  /** Current checkpoint, or the empty default when nothing is persisted */
  load(): Promise<Checkpoint>;
  /** Durable atomic replace */
  updateCheckpoint(checkpoint: Checkpoint): Promise<void>;
  /** Remove persisted state; the next `load()` returns the empty default */
  reset(): Promise<void>;
}

export interface ResultStore {
  load(): Promise<Outcome[]>;
  recordedIds(): Promise<Set<string>>;
  /**
   * Durable append that skips ids already present. Safe to call again
   * with the same outcomes.
   */
  appendOutcomes(outcomes: readonly Outcome[]): Promise<AppendResult>;
  reset(): Promise<void>;
}

// =============================================================================
// Store Error Types
// =============================================================================

export const StoreErrorCode = {
  /** Persisted file could not be read */
  READ_FAILED: 'READ_FAILED',
  /** Persisted file could not be written or replaced */
  WRITE_FAILED: 'WRITE_FAILED',
  /** Persisted file is not valid JSON or does not match its layout */
  CORRUPT_DATA: 'CORRUPT_DATA',
  /** Another execution holds the writer lease */
  LEASE_HELD: 'LEASE_HELD',
} as const;

export type StoreErrorCode = (typeof StoreErrorCode)[keyof typeof StoreErrorCode];

export class StoreError extends Error {
  readonly code: StoreErrorCode;
  readonly filePath: string | undefined;
  readonly cause: Error | undefined;

  constructor(
    message: string,
    code: StoreErrorCode,
    options?: { filePath?: string; cause?: Error }
  ) {
    super(message);
    this.name = 'StoreError';
    this.code = code;
    this.filePath = options?.filePath;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StoreError);
    }
  }

  static fromError(
    error: unknown,
    code: StoreErrorCode,
    filePath?: string
  ): StoreError {
    if (error instanceof StoreError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const cause = error instanceof Error ? error : undefined;
    const options: { filePath?: string; cause?: Error } = {};
    if (filePath !== undefined) options.filePath = filePath;
    if (cause) options.cause = cause;

    return new StoreError(message, code, options);
  }
}

export function isStoreError(error: unknown): error is StoreError {
  return error instanceof StoreError;
}
