/**
 * retry-runner - Shared Library
 *
 * Resumable batched execution of a long job over a work ledger.
 */

// Work Ledger
export * from './ledger/index.js';

// Checkpoint and Result Stores
export * from './store/index.js';

// Extraction Operation
export * from './extraction/index.js';

// Batch Orchestrator
export * from './orchestrator/index.js';

// Status Reporter
export * from './status/index.js';

// Run Trigger
export * from './trigger/index.js';

// Failed-identifier export
export * from './requeue/index.js';

// Configuration
export * from './config/index.js';

// Logging
export * from './logging/index.js';

// Progress Reporting
export * from './progress/index.js';
