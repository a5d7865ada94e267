/**
 * Failed-identifier export
 *
 * Failures are terminal for a job. Retrying them means starting a new job
 * over a ledger built from this one's failures.
 */

import { writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { ResultStore } from '../store/index.js';

/**
 * Failed ids in the order they were recorded, without duplicates
 */
export async function collectFailedIdentifiers(resultStore: ResultStore): Promise<string[]> {
  const outcomes = await resultStore.load();
  const seen = new Set<string>();
  const failed: string[] = [];

  for (const outcome of outcomes) {
    if (outcome.status === 'failed' && !seen.has(outcome.id)) {
      seen.add(outcome.id);
      failed.push(outcome.id);
    }
  }

  return failed;
}

/**
 * Write identifiers as a ledger file, one per line
 */
export async function writeLedgerFile(filePath: string, identifiers: readonly string[]): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  const body = identifiers.length > 0 ? identifiers.join('\n') + '\n' : '';
  await writeFile(filePath, body, 'utf-8');
}
