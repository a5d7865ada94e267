/**
 * Run Trigger Module
 */

export {
  type TriggerAction,
  type TriggerDecision,
  decideNextRun,
  RunChainOptionsSchema,
  type RunChainOptions,
  type RunChainResult,
  runChain,
  formatTriggerOutputs,
  writeTriggerOutputs,
} from './run-trigger.js';
