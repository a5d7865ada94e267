/**
 * Progress Reporting Types
 *
 * Per-run progress tracking: counts of succeeded, failed and skipped
 * items inside one slice, plus the formatting helpers shared with the
 * status report.
 */

import { z } from 'zod';

// =============================================================================
// Progress State
// =============================================================================

export const ProgressState = {
  PENDING: 'pending',
  RUNNING: 'running',
  COMPLETED: 'completed',
  /** Aborted by a fatal error (persistence failure) */
  FAILED: 'failed',
} as const;

export type ProgressState = (typeof ProgressState)[keyof typeof ProgressState];

// =============================================================================
// Progress Entry
// =============================================================================

/**
 * Snapshot of a progress reporter, passed to `onProgress`
 */
export interface ProgressEntry {
  current: number;
  total: number;
  /** 0-100 */
  percentage: number;
  state: ProgressState;
  elapsedMs: number;
  estimatedRemainingMs?: number;
  successCount: number;
  failedCount: number;
  skippedCount: number;
  currentItem?: string;
}

// =============================================================================
// Progress Reporter Configuration
// =============================================================================

export const ProgressReporterConfigSchema = z.object({
  total: z.number().int().nonnegative(),

  onProgress: z
    .function()
    .args(z.custom<ProgressEntry>())
    .returns(z.void())
    .optional(),

  /**
   * Whether to log milestones through the reporter's logger
   * @default true
   */
  autoLog: z.boolean().default(true),

  /**
   * Log interval in percentage points (e.g., 10 = log every 10%)
   * @default 10
   */
  logIntervalPercent: z.number().min(1).max(100).default(10),

  operationName: z.string().optional(),
});

export type ProgressReporterConfig = z.infer<typeof ProgressReporterConfigSchema>;
export type ProgressReporterOptions = Omit<
  z.input<typeof ProgressReporterConfigSchema>,
  'total'
>;

export function createDefaultProgressConfig(
  total: number,
  overrides?: ProgressReporterOptions
): ProgressReporterConfig {
  return ProgressReporterConfigSchema.parse({ ...overrides, total });
}

// =============================================================================
// Run Statistics
// =============================================================================

export interface RunStatistics {
  totalItems: number;
  successCount: number;
  failedCount: number;
  skippedCount: number;
  totalDurationMs: number;
  avgTimePerItemMs: number;
  /** Succeeded share of attempted (non-skipped) items, 0-100 */
  successRate: number;
  errors: string[];
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Percentage with bounds; an empty total counts as done
 */
export function calculatePercentage(current: number, total: number): number {
  if (total === 0) return 100;
  return Math.min(100, Math.max(0, (current / total) * 100));
}

export function estimateRemainingTime(
  elapsedMs: number,
  current: number,
  total: number
): number | undefined {
  if (current === 0 || current >= total) return undefined;
  return (elapsedMs / current) * (total - current);
}

/**
 * Format duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;

  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);

  if (ms < 3600000) return `${minutes}m ${seconds}s`;

  const hours = Math.floor(ms / 3600000);
  const remainingMinutes = Math.floor((ms % 3600000) / 60000);
  return `${hours}h ${remainingMinutes}m`;
}

export function formatProgress(entry: ProgressEntry): string {
  let status = `${entry.current}/${entry.total} (${entry.percentage.toFixed(1)}%)`;

  if (entry.estimatedRemainingMs !== undefined) {
    status += ` - ETA: ${formatDuration(entry.estimatedRemainingMs)}`;
  }

  return `${status} - Elapsed: ${formatDuration(entry.elapsedMs)}`;
}

export function createProgressBar(
  percentage: number,
  width: number = 40,
  filled: string = '█',
  empty: string = '░'
): string {
  const filledCount = Math.round((Math.min(100, Math.max(0, percentage)) / 100) * width);
  return filled.repeat(filledCount) + empty.repeat(width - filledCount);
}
