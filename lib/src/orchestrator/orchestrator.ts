/**
 * Batch Orchestrator
 *
 * Drives one execution of the retry job:
 * - computes the slice `[lastIndex + 1, lastIndex + maxItemsPerRun]`
 * - extracts the slice's items one at a time
 * - flushes every `flushEvery` outcomes and at the end of the slice:
 *   results are appended first, the checkpoint advanced second
 * - reports whether another execution is needed
 *
 * A crash between the two halves of a flush is harmless: recorded ids are
 * merged into the skip set on the next load.
 */

import type { WorkLedger, WorkItem } from '../ledger/index.js';
import { Logger, createSilentLogger } from '../logging/index.js';
import { ProgressReporter } from '../progress/index.js';
import {
  type Checkpoint,
  type CheckpointStore,
  type Outcome,
  type ResultStore,
  advanceCheckpoint,
} from '../store/index.js';
import type { ExtractionOperation } from '../extraction/index.js';
import {
  type RunConfig,
  type RunConfigInput,
  type RunEvents,
  type RunReport,
  type RunSlice,
  ExtractionResultSchema,
  RunAbortedError,
  RunConfigSchema,
  RunErrorCode,
} from './types.js';

export interface OrchestratorOptions {
  logger?: Logger;
  events?: RunEvents;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

/**
 * Slice for the next execution, or null when the ledger is exhausted
 * (this includes an empty ledger and a checkpoint beyond its end)
 */
export function computeRunSlice(
  lastIndex: number,
  ledgerLastIndex: number,
  maxItemsPerRun: number
): RunSlice | null {
  const start = lastIndex + 1;
  if (start > ledgerLastIndex) {
    return null;
  }
  return {
    start,
    end: Math.min(start + maxItemsPerRun - 1, ledgerLastIndex),
  };
}

interface Stores {
  checkpoints: CheckpointStore;
  results: ResultStore;
}

export class BatchOrchestrator {
  private readonly logger: Logger;
  private readonly events: RunEvents;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(
    private readonly extraction: ExtractionOperation,
    options: OrchestratorOptions = {}
  ) {
    this.logger = options.logger ?? createSilentLogger();
    this.events = options.events ?? {};
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.now = options.now ?? (() => new Date());
  }

  async runOnce(
    ledger: WorkLedger,
    checkpointStore: CheckpointStore,
    resultStore: ResultStore,
    configInput: RunConfigInput = {}
  ): Promise<RunReport> {
    const config = RunConfigSchema.parse(configInput);
    const stores: Stores = { checkpoints: checkpointStore, results: resultStore };
    const startedAt = this.now().getTime();

    let checkpoint: Checkpoint;
    let recorded: Set<string>;
    try {
      checkpoint = await checkpointStore.load();
      recorded = await resultStore.recordedIds();
    } catch (error) {
      this.logger.error('Could not load progress state', error);
      throw new RunAbortedError(
        `Could not load progress state: ${errorMessage(error)}`,
        RunErrorCode.LOAD_FAILED,
        { lastDurableIndex: null, cause: error }
      );
    }

    const slice = computeRunSlice(checkpoint.lastIndex, ledger.lastIndex, config.maxItemsPerRun);
    if (!slice) {
      this.logger.info('All items already processed', {
        ledgerSize: ledger.size,
        lastIndex: checkpoint.lastIndex,
      });
      return {
        slice: null,
        attempted: 0,
        succeeded: 0,
        failed: 0,
        skipped: 0,
        flushes: 0,
        lastIndex: checkpoint.lastIndex,
        ledgerSize: ledger.size,
        hasMoreWork: false,
        durationMs: this.now().getTime() - startedAt,
      };
    }

    // Ids appended by a flush whose checkpoint update never landed
    const recovered = [...recorded].filter((id) => !checkpoint.processedIds.has(id));
    if (recovered.length > 0) {
      this.logger.warn('Recovered outcomes missing from checkpoint', {
        count: recovered.length,
      });
    }

    const accounted = new Set([...checkpoint.processedIds, ...recorded]);
    const progress = new ProgressReporter(slice.end - slice.start + 1, {
      logger: this.logger,
      operationName: `Slice ${slice.start}..${slice.end}`,
      logIntervalPercent: 25,
      now: () => this.now().getTime(),
    });

    this.logger.info('Starting run', {
      ledgerSize: ledger.size,
      start: slice.start,
      end: slice.end,
      alreadyProcessed: accounted.size,
      ...config,
    });
    progress.start();

    let pending: Outcome[] = [];
    let flushes = 0;

    try {
      for (const item of ledger.slice(slice.start, slice.end)) {
        const isLast = item.index === slice.end;
        let attempted = false;
        const label = `[${item.index + 1}/${ledger.size}]`;

        if (accounted.has(item.id)) {
          this.logger.info(`${label} Skipping (already processed): ${item.id}`);
          progress.skip(item.id);
          this.events.onItemSkipped?.(item);
        } else {
          this.logger.info(`${label} Processing: ${item.id}`);
          this.events.onItemStart?.(item);

          const outcome = await this.attempt(item, config);
          attempted = true;
          pending.push(outcome);
          accounted.add(item.id);

          if (outcome.status === 'succeeded') {
            this.logger.info(`${label} Succeeded: ${item.id}`);
            progress.success(item.id);
          } else {
            this.logger.warn(`${label} Failed: ${item.id}`, { error: outcome.error });
            progress.fail(outcome.error ?? 'unknown error', item.id);
          }
          this.events.onItemComplete?.(item, outcome);
        }

        if (pending.length >= config.flushEvery || isLast) {
          checkpoint = await this.flush(stores, checkpoint, pending, item.index, recovered);
          pending = [];
          flushes++;
        }

        if (attempted && !isLast && config.interItemDelayMs > 0) {
          await this.sleep(config.interItemDelayMs);
        }
      }
    } catch (error) {
      progress.abort(errorMessage(error));
      throw error;
    }

    progress.complete();
    const stats = progress.getStatistics();
    const report: RunReport = {
      slice,
      attempted: stats.successCount + stats.failedCount,
      succeeded: stats.successCount,
      failed: stats.failedCount,
      skipped: stats.skippedCount,
      flushes,
      lastIndex: checkpoint.lastIndex,
      ledgerSize: ledger.size,
      hasMoreWork: slice.end < ledger.lastIndex,
      durationMs: this.now().getTime() - startedAt,
    };

    this.logger.info('Run finished', {
      attempted: report.attempted,
      succeeded: report.succeeded,
      failed: report.failed,
      skipped: report.skipped,
      nextStartIndex: report.lastIndex + 1,
      remaining: ledger.size - (report.lastIndex + 1),
      hasMoreWork: report.hasMoreWork,
    });

    return report;
  }

  /**
   * Extract one item. Never throws: faults, timeouts and malformed
   * results all become failed outcomes. A timed-out call is aborted and
   * awaited, so no two extractions of a run ever overlap.
   */
  private async attempt(item: WorkItem, config: RunConfig): Promise<Outcome> {
    const controller = new AbortController();
    const timeoutMs = config.extractionTimeoutMs;
    let timer: NodeJS.Timeout | undefined;

    try {
      const work = this.extraction.extract(item.id, controller.signal);

      if (timeoutMs !== undefined) {
        const settled = work.then(
          () => 'settled' as const,
          () => 'settled' as const
        );
        const expired = new Promise<'expired'>((resolve) => {
          timer = setTimeout(() => resolve('expired'), timeoutMs);
        });

        if ((await Promise.race([settled, expired])) === 'expired') {
          controller.abort();
          await settled;
          return this.toOutcome(
            item.id,
            'failed',
            null,
            `Extraction timed out after ${timeoutMs}ms`
          );
        }
      }

      const parsed = ExtractionResultSchema.safeParse(await work);
      if (!parsed.success) {
        return this.toOutcome(item.id, 'failed', null, 'Extraction returned a malformed result');
      }

      const { status, payload, error } = parsed.data;
      return this.toOutcome(
        item.id,
        status,
        payload,
        status === 'failed' ? error ?? 'Extraction failed' : null
      );
    } catch (error) {
      this.logger.debug('Extraction raised', { id: item.id, error: errorMessage(error) });
      return this.toOutcome(item.id, 'failed', null, errorMessage(error));
    } finally {
      if (timer) clearTimeout(timer);
    }
  }

  /**
   * Append pending outcomes, then advance the checkpoint to `index`.
   * The order is what keeps a crash from skipping unrecorded items.
   */
  private async flush(
    stores: Stores,
    checkpoint: Checkpoint,
    pending: readonly Outcome[],
    index: number,
    recovered: readonly string[]
  ): Promise<Checkpoint> {
    let appended = 0;
    if (pending.length > 0) {
      try {
        appended = (await stores.results.appendOutcomes(pending)).appended;
      } catch (error) {
        this.logger.error('Result store append failed', error, { index });
        throw new RunAbortedError(
          `Result store append failed: ${errorMessage(error)}`,
          RunErrorCode.RESULT_APPEND_FAILED,
          { lastDurableIndex: checkpoint.lastIndex, cause: error }
        );
      }
    }

    const next = advanceCheckpoint(
      checkpoint,
      index,
      [...pending.map((outcome) => outcome.id), ...recovered],
      this.now()
    );

    try {
      await stores.checkpoints.updateCheckpoint(next);
    } catch (error) {
      this.logger.error('Checkpoint update failed', error, { index });
      throw new RunAbortedError(
        `Checkpoint update failed: ${errorMessage(error)}`,
        RunErrorCode.CHECKPOINT_UPDATE_FAILED,
        { lastDurableIndex: checkpoint.lastIndex, cause: error }
      );
    }

    this.logger.info(`Flushed ${pending.length} outcome(s), checkpoint at index ${next.lastIndex}`, {
      processed: next.processedIds.size,
    });
    this.events.onFlush?.({ lastIndex: next.lastIndex, outcomes: pending.length, appended });
    return next;
  }

  private toOutcome(
    id: string,
    status: Outcome['status'],
    payload: Record<string, unknown> | null,
    error: string | null
  ): Outcome {
    return { id, status, payload, error, recordedAt: this.now().toISOString() };
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run one execution against the given stores
 */
export function runOnce(
  ledger: WorkLedger,
  checkpointStore: CheckpointStore,
  resultStore: ResultStore,
  config: RunConfigInput,
  extraction: ExtractionOperation,
  options?: OrchestratorOptions
): Promise<RunReport> {
  return new BatchOrchestrator(extraction, options).runOnce(
    ledger,
    checkpointStore,
    resultStore,
    config
  );
}
