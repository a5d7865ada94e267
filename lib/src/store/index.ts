/**
 * Checkpoint / Result Store Module
 *
 * Durable progress state for the orchestrator: atomic checkpoint
 * replacement, idempotent outcome appends and the single-writer lease.
 */

export * from './types.js';

export {
  createEmptyCheckpoint,
  advanceCheckpoint,
  toPersistedCheckpoint,
  fromPersistedCheckpoint,
  resetJob,
} from './checkpoint.js';

export { readJsonFile, writeJsonAtomic, removeFile } from './file-io.js';

export {
  FileCheckpointStore,
  FileResultStore,
  toPersistedOutcome,
  fromPersistedOutcome,
} from './file-stores.js';

export { MemoryCheckpointStore, MemoryResultStore } from './memory-stores.js';

export {
  FileLease,
  withLease,
  LeaseRecordSchema,
  type LeaseRecord,
  type FileLeaseOptions,
} from './lease.js';
