/**
 * Checkpoint values: the empty default, monotonic advancement, the
 * mapping to and from the persisted layout, and the explicit job reset.
 */

import type { Checkpoint, CheckpointStore, PersistedCheckpoint, ResultStore } from './types.js';

export function createEmptyCheckpoint(): Checkpoint {
  return {
    lastIndex: -1,
    processedIds: new Set<string>(),
    updatedAt: null,
  };
}

/**
 * Next checkpoint after a flush. Takes the max of the indices and the
 * union of the id sets, so a checkpoint never moves backwards.
 */
export function advanceCheckpoint(
  previous: Checkpoint,
  lastIndex: number,
  ids: Iterable<string>,
  now: Date = new Date()
): Checkpoint {
  const processedIds = new Set(previous.processedIds);
  for (const id of ids) {
    processedIds.add(id);
  }

  return {
    lastIndex: Math.max(previous.lastIndex, lastIndex),
    processedIds,
    updatedAt: now.toISOString(),
  };
}

export function toPersistedCheckpoint(checkpoint: Checkpoint): PersistedCheckpoint {
  return {
    last_index: checkpoint.lastIndex,
    processed_urls: [...checkpoint.processedIds],
    timestamp: checkpoint.updatedAt ?? new Date().toISOString(),
  };
}

export function fromPersistedCheckpoint(data: PersistedCheckpoint): Checkpoint {
  return {
    lastIndex: data.last_index,
    processedIds: new Set(data.processed_urls),
    updatedAt: data.timestamp,
  };
}

/**
 * Clear a job's persisted state. Results are cleared before the
 * checkpoint, so an interrupted reset never leaves recorded results
 * behind a fresh checkpoint; running it again finishes the reset.
 */
export async function resetJob(checkpoints: CheckpointStore, results: ResultStore): Promise<void> {
  await results.reset();
  await checkpoints.reset();
}
