/**
 * In-memory stores, for embedding the engine without a filesystem and
 * for tests. Values are copied in and out so callers cannot mutate the
 * stored state.
 */

import type {
  AppendResult,
  Checkpoint,
  CheckpointStore,
  Outcome,
  ResultStore,
} from './types.js';
import { createEmptyCheckpoint } from './checkpoint.js';

export class MemoryCheckpointStore implements CheckpointStore {
  private checkpoint: Checkpoint;

  constructor(initial?: Checkpoint) {
    this.checkpoint = initial ? copyCheckpoint(initial) : createEmptyCheckpoint();
  }

  async load(): Promise<Checkpoint> {
    return copyCheckpoint(this.checkpoint);
  }

  async updateCheckpoint(checkpoint: Checkpoint): Promise<void> {
    this.checkpoint = copyCheckpoint(checkpoint);
  }

  async reset(): Promise<void> {
    this.checkpoint = createEmptyCheckpoint();
  }
}

export class MemoryResultStore implements ResultStore {
  private readonly outcomes: Outcome[] = [];

  constructor(initial: readonly Outcome[] = []) {
    for (const outcome of initial) {
      this.outcomes.push({ ...outcome });
    }
  }

  async load(): Promise<Outcome[]> {
    return this.outcomes.map((outcome) => ({ ...outcome }));
  }

  async recordedIds(): Promise<Set<string>> {
    return new Set(this.outcomes.map((outcome) => outcome.id));
  }

  async appendOutcomes(outcomes: readonly Outcome[]): Promise<AppendResult> {
    const seen = new Set(this.outcomes.map((outcome) => outcome.id));
    let appended = 0;

    for (const outcome of outcomes) {
      if (seen.has(outcome.id)) continue;
      seen.add(outcome.id);
      this.outcomes.push({ ...outcome });
      appended++;
    }

    return { appended, duplicates: outcomes.length - appended };
  }

  async reset(): Promise<void> {
    this.outcomes.length = 0;
  }
}

function copyCheckpoint(checkpoint: Checkpoint): Checkpoint {
  return {
    lastIndex: checkpoint.lastIndex,
    processedIds: new Set(checkpoint.processedIds),
    updatedAt: checkpoint.updatedAt,
  };
}
