/**
 * Progress Reporter
 *
 * Tracks one run's slice: every item ends up counted as a success, a
 * failure or a skip. Milestones go to the injected logger at
 * `logIntervalPercent` steps.
 */

import { Logger, createSilentLogger } from '../logging/index.js';
import {
  type ProgressEntry,
  type ProgressReporterConfig,
  type ProgressReporterOptions,
  type RunStatistics,
  ProgressState,
  createDefaultProgressConfig,
  calculatePercentage,
  estimateRemainingTime,
  formatProgress,
  formatDuration,
  createProgressBar,
} from './types.js';

export class ProgressReporter {
  private readonly config: ProgressReporterConfig;
  private readonly logger: Logger;
  private readonly now: () => number;
  private current: number = 0;
  private successCount: number = 0;
  private failedCount: number = 0;
  private skippedCount: number = 0;
  private state: ProgressState = ProgressState.PENDING;
  private startTime: number | null = null;
  private endTime: number | null = null;
  private lastLoggedPercent: number = 0;
  private currentItem: string | undefined;
  private errors: string[] = [];

  constructor(
    total: number,
    options?: ProgressReporterOptions & { logger?: Logger; now?: () => number }
  ) {
    const { logger, now, ...rest } = options ?? {};
    this.config = createDefaultProgressConfig(total, rest);
    this.logger = logger ?? createSilentLogger();
    this.now = now ?? Date.now;
  }

  start(): void {
    this.startTime = this.now();
    this.state = ProgressState.RUNNING;
    this.lastLoggedPercent = 0;

    if (this.config.autoLog) {
      this.logger.info(`${this.operationName()}: starting (${this.config.total} items)`);
    }

    this.emitProgress();
  }

  success(currentItem?: string): void {
    this.advance(currentItem, () => this.successCount++);
  }

  fail(error?: string, currentItem?: string): void {
    if (error) {
      this.errors.push(currentItem ? `${currentItem}: ${error}` : error);
    }
    this.advance(currentItem, () => this.failedCount++);
  }

  skip(currentItem?: string): void {
    this.advance(currentItem, () => this.skippedCount++);
  }

  complete(): void {
    this.endTime = this.now();
    this.state = ProgressState.COMPLETED;

    if (this.config.autoLog) {
      this.logger.info(
        `${this.operationName()}: completed - ${this.successCount} succeeded, ` +
          `${this.failedCount} failed, ${this.skippedCount} skipped ` +
          `in ${formatDuration(this.getElapsedMs())}`
      );
    }

    this.emitProgress();
  }

  abort(error?: string): void {
    this.endTime = this.now();
    this.state = ProgressState.FAILED;

    if (error) {
      this.errors.push(error);
    }

    if (this.config.autoLog) {
      this.logger.error(`${this.operationName()}: aborted - ${error ?? 'unknown error'}`);
    }

    this.emitProgress();
  }

  getProgress(): ProgressEntry {
    const elapsedMs = this.getElapsedMs();
    const entry: ProgressEntry = {
      current: this.current,
      total: this.config.total,
      percentage: calculatePercentage(this.current, this.config.total),
      state: this.state,
      elapsedMs,
      successCount: this.successCount,
      failedCount: this.failedCount,
      skippedCount: this.skippedCount,
    };

    const eta = estimateRemainingTime(elapsedMs, this.current, this.config.total);
    if (eta !== undefined) {
      entry.estimatedRemainingMs = eta;
    }
    if (this.currentItem !== undefined) {
      entry.currentItem = this.currentItem;
    }
    return entry;
  }

  getStatistics(): RunStatistics {
    const elapsedMs = this.getElapsedMs();
    const attempted = this.successCount + this.failedCount;
    const processed = attempted + this.skippedCount;

    return {
      totalItems: this.config.total,
      successCount: this.successCount,
      failedCount: this.failedCount,
      skippedCount: this.skippedCount,
      totalDurationMs: elapsedMs,
      avgTimePerItemMs: processed > 0 ? elapsedMs / processed : 0,
      successRate: attempted > 0 ? (this.successCount / attempted) * 100 : 0,
      errors: [...this.errors],
    };
  }

  getElapsedMs(): number {
    if (this.startTime === null) return 0;
    return (this.endTime ?? this.now()) - this.startTime;
  }

  getState(): ProgressState {
    return this.state;
  }

  isRunning(): boolean {
    return this.state === ProgressState.RUNNING;
  }

  toString(): string {
    return formatProgress(this.getProgress());
  }

  toProgressBar(width: number = 40): string {
    const entry = this.getProgress();
    return `[${createProgressBar(entry.percentage, width)}] ${entry.percentage.toFixed(1)}%`;
  }

  private advance(currentItem: string | undefined, count: () => void): void {
    if (this.state !== ProgressState.RUNNING) {
      return;
    }

    this.current++;
    count();
    if (currentItem !== undefined) {
      this.currentItem = currentItem;
    }

    this.emitProgress();
  }

  private operationName(): string {
    return this.config.operationName ?? 'Progress';
  }

  private emitProgress(): void {
    const entry = this.getProgress();

    this.config.onProgress?.(entry);

    if (!this.config.autoLog || this.state !== ProgressState.RUNNING || this.current === 0) {
      return;
    }

    const currentPercent = Math.floor(entry.percentage);
    const interval = this.config.logIntervalPercent;

    if (currentPercent >= this.lastLoggedPercent + interval) {
      this.lastLoggedPercent = currentPercent - (currentPercent % interval);
      this.logger.info(`${this.operationName()}: ${this.toString()}`);
    }
  }
}

export function createProgressReporter(
  total: number,
  options?: ProgressReporterOptions & { logger?: Logger; now?: () => number }
): ProgressReporter {
  return new ProgressReporter(total, options);
}
