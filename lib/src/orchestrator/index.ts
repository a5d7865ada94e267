/**
 * Batch Orchestrator Module
 */

export {
  RunConfigSchema,
  type RunConfig,
  type RunConfigInput,
  ExtractionResultSchema,
  type RunSlice,
  type RunReport,
  type FlushEvent,
  type RunEvents,
  RunErrorCode,
  RunAbortedError,
  isRunAbortedError,
} from './types.js';

export {
  BatchOrchestrator,
  type OrchestratorOptions,
  computeRunSlice,
  runOnce,
} from './orchestrator.js';
