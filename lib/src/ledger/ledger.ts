/**
 * Work Ledger
 *
 * The fixed, ordered list of identifiers a job works through. Loaded once
 * per execution and never mutated. Duplicate identifiers are kept: the
 * orchestrator treats later occurrences as no-ops.
 */

import { readFile } from 'node:fs/promises';
import { type WorkItem, LedgerError, LedgerErrorCode } from './types.js';

export class WorkLedger {
  private readonly items: readonly WorkItem[];

  private constructor(ids: readonly string[]) {
    this.items = Object.freeze(ids.map((id, index) => Object.freeze({ id, index })));
  }

  static fromIdentifiers(ids: readonly string[]): WorkLedger {
    return new WorkLedger([...ids]);
  }

  /**
   * Parse a ledger with one identifier per line. Lines are trimmed and
   * blank lines dropped, so positions count non-blank lines only.
   */
  static fromText(text: string): WorkLedger {
    const ids = text
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
    return new WorkLedger(ids);
  }

  get size(): number {
    return this.items.length;
  }

  /** Index of the last item, -1 for an empty ledger */
  get lastIndex(): number {
    return this.items.length - 1;
  }

  at(index: number): WorkItem | undefined {
    return this.items[index];
  }

  /**
   * Items in the inclusive range `[start, end]`
   */
  slice(start: number, end: number): WorkItem[] {
    if (start < 0 || end > this.lastIndex || start > end + 1) {
      throw new LedgerError(
        `Range ${start}..${end} is outside ledger of ${this.size} items`,
        LedgerErrorCode.OUT_OF_RANGE
      );
    }
    return this.items.slice(start, end + 1);
  }

  identifiers(): string[] {
    return this.items.map((item) => item.id);
  }
}

/**
 * Read a ledger file (UTF-8, one identifier per line)
 */
export async function loadWorkLedger(filePath: string): Promise<WorkLedger> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    const options = cause ? { filePath, cause } : { filePath };
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new LedgerError(
        `Work ledger not found: ${filePath}`,
        LedgerErrorCode.LEDGER_NOT_FOUND,
        options
      );
    }
    throw new LedgerError(
      `Could not read work ledger ${filePath}: ${cause?.message ?? String(error)}`,
      LedgerErrorCode.LEDGER_UNREADABLE,
      options
    );
  }
  return WorkLedger.fromText(content);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
