/**
 * File-backed Checkpoint and Result Stores
 *
 * The checkpoint file holds `{ last_index, processed_urls, timestamp }`;
 * the results file holds a JSON array of outcome records. Both are
 * replaced atomically on every write.
 */

import {
  type AppendResult,
  type Checkpoint,
  type CheckpointStore,
  type Outcome,
  type PersistedOutcome,
  type ResultStore,
  PersistedCheckpointSchema,
  PersistedOutcomeListSchema,
} from './types.js';
import {
  createEmptyCheckpoint,
  fromPersistedCheckpoint,
  toPersistedCheckpoint,
} from './checkpoint.js';
import { readJsonFile, removeFile, writeJsonAtomic } from './file-io.js';

// ============================================================================
// Checkpoint Store
// ============================================================================

export class FileCheckpointStore implements CheckpointStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<Checkpoint> {
    const data = await readJsonFile(this.filePath, PersistedCheckpointSchema);
    return data ? fromPersistedCheckpoint(data) : createEmptyCheckpoint();
  }

  async updateCheckpoint(checkpoint: Checkpoint): Promise<void> {
    await writeJsonAtomic(this.filePath, toPersistedCheckpoint(checkpoint));
  }

  async reset(): Promise<void> {
    await removeFile(this.filePath);
  }
}

// ============================================================================
// Result Store
// ============================================================================

export class FileResultStore implements ResultStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<Outcome[]> {
    return (await this.readRecords()).map(fromPersistedOutcome);
  }

  async recordedIds(): Promise<Set<string>> {
    const records = await this.readRecords();
    return new Set(records.map((record) => record.id));
  }

  /**
   * Read-merge-replace: existing records are kept, new ids appended in
   * order, ids already present (on disk or earlier in `outcomes`) dropped.
   */
  async appendOutcomes(outcomes: readonly Outcome[]): Promise<AppendResult> {
    if (outcomes.length === 0) {
      return { appended: 0, duplicates: 0 };
    }

    const records = await this.readRecords();
    const seen = new Set(records.map((record) => record.id));
    let appended = 0;

    for (const outcome of outcomes) {
      if (seen.has(outcome.id)) {
        continue;
      }
      seen.add(outcome.id);
      records.push(toPersistedOutcome(outcome));
      appended++;
    }

    if (appended > 0) {
      await writeJsonAtomic(this.filePath, records);
    }

    return { appended, duplicates: outcomes.length - appended };
  }

  async reset(): Promise<void> {
    await removeFile(this.filePath);
  }

  private async readRecords(): Promise<PersistedOutcome[]> {
    return (await readJsonFile(this.filePath, PersistedOutcomeListSchema)) ?? [];
  }
}

export function toPersistedOutcome(outcome: Outcome): PersistedOutcome {
  return {
    id: outcome.id,
    status: outcome.status,
    payload: outcome.payload,
    error: outcome.error,
    recorded_at: outcome.recordedAt,
  };
}

export function fromPersistedOutcome(record: PersistedOutcome): Outcome {
  return {
    id: record.id,
    status: record.status,
    payload: record.payload,
    error: record.error,
    recordedAt: record.recorded_at ?? '',
  };
}
