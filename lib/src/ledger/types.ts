/**
 * Work Ledger Types
 */

/**
 * One entry of the work ledger: an opaque identifier (usually a URL) and
 * its 0-based position.
 */
export interface WorkItem {
  readonly id: string;
  readonly index: number;
}

// =============================================================================
// Ledger Error Types
// =============================================================================

export const LedgerErrorCode = {
  /** Ledger file does not exist */
  LEDGER_NOT_FOUND: 'LEDGER_NOT_FOUND',
  /** Ledger file exists but could not be read */
  LEDGER_UNREADABLE: 'LEDGER_UNREADABLE',
  /** Requested range lies outside the ledger */
  OUT_OF_RANGE: 'OUT_OF_RANGE',
} as const;

export type LedgerErrorCode = (typeof LedgerErrorCode)[keyof typeof LedgerErrorCode];

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;
  readonly filePath: string | undefined;
  readonly cause: Error | undefined;

  constructor(
    message: string,
    code: LedgerErrorCode,
    options?: { filePath?: string; cause?: Error }
  ) {
    super(message);
    this.name = 'LedgerError';
    this.code = code;
    this.filePath = options?.filePath;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LedgerError);
    }
  }
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}
