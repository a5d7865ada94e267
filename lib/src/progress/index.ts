/**
 * Progress Module
 */

export {
  ProgressState,
  type ProgressEntry,
  ProgressReporterConfigSchema,
  type ProgressReporterConfig,
  type ProgressReporterOptions,
  createDefaultProgressConfig,
  type RunStatistics,
  calculatePercentage,
  estimateRemainingTime,
  formatDuration,
  formatProgress,
  createProgressBar,
} from './types.js';

export { ProgressReporter, createProgressReporter } from './reporter.js';
