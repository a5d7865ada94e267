/**
 * Configuration Module
 */

export {
  RunnerConfigSchema,
  type RunnerConfig,
  type RunnerEnv,
  loadRunnerConfig,
  validateRunnerEnv,
} from './runner-config.js';
