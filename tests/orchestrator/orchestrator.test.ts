/**
 * Tests for BatchOrchestrator
 */

import { describe, it, expect, vi } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  BatchOrchestrator,
  computeRunSlice,
  runOnce,
  type OrchestratorOptions,
} from '../../lib/src/orchestrator/orchestrator.js';
import {
  RunAbortedError,
  RunErrorCode,
  isRunAbortedError,
  type FlushEvent,
} from '../../lib/src/orchestrator/types.js';
import { WorkLedger } from '../../lib/src/ledger/ledger.js';
import { MemoryCheckpointStore, MemoryResultStore } from '../../lib/src/store/memory-stores.js';
import { FileCheckpointStore, FileResultStore } from '../../lib/src/store/file-stores.js';
import { advanceCheckpoint, createEmptyCheckpoint } from '../../lib/src/store/checkpoint.js';
import {
  PersistedCheckpointSchema,
  PersistedOutcomeListSchema,
  type AppendResult,
  type Checkpoint,
  type Outcome,
} from '../../lib/src/store/types.js';
import {
  type ExtractionOperation,
  type ExtractionResult,
  type PageSession,
  type PageSessionFactory,
  succeeded,
} from '../../lib/src/extraction/types.js';
import { PageExtractor } from '../../lib/src/extraction/page-extractor.js';

// ============================================================================
// Fixtures
// ============================================================================

const NOW = new Date('2026-03-01T10:00:00.000Z');

function itemId(index: number): string {
  return `https://example.test/item/${index}`;
}

function makeLedger(size: number): WorkLedger {
  return WorkLedger.fromIdentifiers(Array.from({ length: size }, (_, i) => itemId(i)));
}

class FakeExtraction implements ExtractionOperation {
  readonly calls: string[] = [];

  constructor(
    private readonly behavior: (id: string) => Promise<ExtractionResult> = async (id) =>
      succeeded({ url: id, title: `Title of ${id}` })
  ) {}

  async extract(id: string): Promise<ExtractionResult> {
    this.calls.push(id);
    return this.behavior(id);
  }
}

class FlakyResultStore extends MemoryResultStore {
  private appends = 0;

  constructor(private readonly failOnAppend: number) {
    super();
  }

  async appendOutcomes(outcomes: readonly Outcome[]): Promise<AppendResult> {
    this.appends++;
    if (this.appends === this.failOnAppend) {
      throw new Error('disk full');
    }
    return super.appendOutcomes(outcomes);
  }
}

class FlakyCheckpointStore extends MemoryCheckpointStore {
  failUpdates = false;
  failLoad = false;

  async load(): Promise<Checkpoint> {
    if (this.failLoad) {
      throw new Error('permission denied');
    }
    return super.load();
  }

  async updateCheckpoint(checkpoint: Checkpoint): Promise<void> {
    if (this.failUpdates) {
      throw new Error('rename failed');
    }
    return super.updateCheckpoint(checkpoint);
  }
}

function testOptions(overrides: OrchestratorOptions = {}): OrchestratorOptions {
  return {
    sleep: async () => {},
    now: () => NOW,
    ...overrides,
  };
}

function outcome(index: number, status: Outcome['status'] = 'succeeded'): Outcome {
  return {
    id: itemId(index),
    status,
    payload: status === 'succeeded' ? { url: itemId(index) } : null,
    error: status === 'failed' ? 'Empty content' : null,
    recordedAt: NOW.toISOString(),
  };
}

// ============================================================================
// computeRunSlice
// ============================================================================

describe('computeRunSlice', () => {
  it('should start after the checkpoint', () => {
    expect(computeRunSlice(-1, 1162, 100)).toEqual({ start: 0, end: 99 });
    expect(computeRunSlice(99, 1162, 100)).toEqual({ start: 100, end: 199 });
  });

  it('should clamp the end to the ledger', () => {
    expect(computeRunSlice(1099, 1162, 100)).toEqual({ start: 1100, end: 1162 });
  });

  it('should return null when nothing is left', () => {
    expect(computeRunSlice(1162, 1162, 100)).toBeNull();
    expect(computeRunSlice(-1, -1, 100)).toBeNull();
    expect(computeRunSlice(20, 4, 100)).toBeNull();
  });
});

// ============================================================================
// runOnce
// ============================================================================

describe('BatchOrchestrator', () => {
  describe('slicing', () => {
    it('should attempt at most maxItemsPerRun items from a fresh start', async () => {
      const ledger = makeLedger(1163);
      const checkpoints = new MemoryCheckpointStore();
      const results = new MemoryResultStore();
      const extraction = new FakeExtraction();

      const report = await new BatchOrchestrator(extraction, testOptions()).runOnce(
        ledger,
        checkpoints,
        results,
        { maxItemsPerRun: 100, flushEvery: 5 }
      );

      expect(report.slice).toEqual({ start: 0, end: 99 });
      expect(report.attempted).toBe(100);
      expect(report.succeeded).toBe(100);
      expect(report.flushes).toBe(20);
      expect(report.lastIndex).toBe(99);
      expect(report.ledgerSize).toBe(1163);
      expect(report.hasMoreWork).toBe(true);
      expect(extraction.calls[0]).toBe(itemId(0));
      expect(extraction.calls[99]).toBe(itemId(99));

      const checkpoint = await checkpoints.load();
      expect(checkpoint.lastIndex).toBe(99);
      expect(checkpoint.processedIds.size).toBe(100);
      expect(await results.load()).toHaveLength(100);
    });

    it('should finish the ledger on the last slice', async () => {
      const ledger = makeLedger(7);
      const checkpoints = new MemoryCheckpointStore(
        advanceCheckpoint(createEmptyCheckpoint(), 4, [0, 1, 2, 3, 4].map(itemId), NOW)
      );
      const extraction = new FakeExtraction();

      const report = await runOnce(
        ledger,
        checkpoints,
        new MemoryResultStore(),
        { maxItemsPerRun: 100 },
        extraction,
        testOptions()
      );

      expect(report.slice).toEqual({ start: 5, end: 6 });
      expect(extraction.calls).toEqual([itemId(5), itemId(6)]);
      expect(report.hasMoreWork).toBe(false);
      expect(report.lastIndex).toBe(6);
    });
  });

  describe('flushing', () => {
    it('should flush every N outcomes and at the end of the slice', async () => {
      const flushes: FlushEvent[] = [];
      const results = new MemoryResultStore();

      const report = await runOnce(
        makeLedger(7),
        new MemoryCheckpointStore(),
        results,
        { maxItemsPerRun: 100, flushEvery: 5 },
        new FakeExtraction(),
        testOptions({ events: { onFlush: (event) => flushes.push(event) } })
      );

      expect(flushes).toEqual([
        { lastIndex: 4, outcomes: 5, appended: 5 },
        { lastIndex: 6, outcomes: 2, appended: 2 },
      ]);
      expect(report.flushes).toBe(2);
      expect((await results.load()).map((o) => o.id)).toEqual([0, 1, 2, 3, 4, 5, 6].map(itemId));
    });

    it('should append outcomes before advancing the checkpoint', async () => {
      const order: string[] = [];
      const results = new MemoryResultStore();
      const checkpoints = new MemoryCheckpointStore();
      const append = results.appendOutcomes.bind(results);
      const update = checkpoints.updateCheckpoint.bind(checkpoints);
      vi.spyOn(results, 'appendOutcomes').mockImplementation(async (outcomes) => {
        order.push('append');
        return append(outcomes);
      });
      vi.spyOn(checkpoints, 'updateCheckpoint').mockImplementation(async (checkpoint) => {
        order.push('checkpoint');
        return update(checkpoint);
      });

      await runOnce(makeLedger(4), checkpoints, results, { flushEvery: 2 }, new FakeExtraction(), testOptions());

      expect(order).toEqual(['append', 'checkpoint', 'append', 'checkpoint']);
    });

    it('should advance the checkpoint to the slice end even when every item was skipped', async () => {
      const results = new MemoryResultStore([outcome(0), outcome(1), outcome(2)]);
      const checkpoints = new MemoryCheckpointStore();
      const appendSpy = vi.spyOn(results, 'appendOutcomes');
      const extraction = new FakeExtraction();

      const report = await runOnce(makeLedger(3), checkpoints, results, {}, extraction, testOptions());

      expect(extraction.calls).toEqual([]);
      expect(appendSpy).not.toHaveBeenCalled();
      expect(report.skipped).toBe(3);
      expect(report.flushes).toBe(1);
      const checkpoint = await checkpoints.load();
      expect(checkpoint.lastIndex).toBe(2);
      expect([...checkpoint.processedIds].sort()).toEqual([0, 1, 2].map(itemId).sort());
    });
  });

  describe('resumability', () => {
    it('should continue where the previous execution stopped', async () => {
      const ledger = makeLedger(7);
      const checkpoints = new MemoryCheckpointStore();
      const results = new MemoryResultStore();
      const extraction = new FakeExtraction();
      const orchestrator = new BatchOrchestrator(extraction, testOptions());
      const config = { maxItemsPerRun: 3, flushEvery: 2 };

      const first = await orchestrator.runOnce(ledger, checkpoints, results, config);
      const second = await orchestrator.runOnce(ledger, checkpoints, results, config);
      const third = await orchestrator.runOnce(ledger, checkpoints, results, config);

      expect(first.slice).toEqual({ start: 0, end: 2 });
      expect(second.slice).toEqual({ start: 3, end: 5 });
      expect(third.slice).toEqual({ start: 6, end: 6 });
      expect([first.hasMoreWork, second.hasMoreWork, third.hasMoreWork]).toEqual([true, true, false]);
      expect(extraction.calls).toEqual(ledger.identifiers());
    });

    it('should not duplicate results after a crash between append and checkpoint update', async () => {
      const dir = await mkdtemp(join(tmpdir(), 'orchestrator-'));
      const checkpointFile = join(dir, 'checkpoint.json');
      const resultsFile = join(dir, 'results.json');

      class CrashingCheckpointStore extends FileCheckpointStore {
        async updateCheckpoint(): Promise<void> {
          throw new Error('process killed');
        }
      }

      try {
        const ledger = makeLedger(4);
        const extraction = new FakeExtraction();
        const config = { maxItemsPerRun: 4, flushEvery: 2 };

        await expect(
          runOnce(
            ledger,
            new CrashingCheckpointStore(checkpointFile),
            new FileResultStore(resultsFile),
            config,
            extraction,
            testOptions()
          )
        ).rejects.toBeInstanceOf(RunAbortedError);

        const resumed = await runOnce(
          ledger,
          new FileCheckpointStore(checkpointFile),
          new FileResultStore(resultsFile),
          config,
          extraction,
          testOptions()
        );

        const recorded = PersistedOutcomeListSchema.parse(
          JSON.parse(await readFile(resultsFile, 'utf-8'))
        ).map((record) => record.id);
        const checkpoint = PersistedCheckpointSchema.parse(
          JSON.parse(await readFile(checkpointFile, 'utf-8'))
        );

        expect(resumed.skipped).toBe(2);
        expect(resumed.attempted).toBe(2);
        expect(recorded).toEqual(ledger.identifiers());
        expect(new Set(recorded).size).toBe(recorded.length);
        expect(checkpoint.last_index).toBe(3);
        expect([...checkpoint.processed_urls].sort()).toEqual(ledger.identifiers());
        expect(extraction.calls).toEqual(ledger.identifiers());
      } finally {
        await rm(dir, { recursive: true, force: true });
      }
    });

    it('should do nothing once the ledger is exhausted', async () => {
      const ledger = makeLedger(3);
      const checkpoints = new MemoryCheckpointStore();
      const results = new MemoryResultStore();
      const extraction = new FakeExtraction();
      const orchestrator = new BatchOrchestrator(extraction, testOptions());

      await orchestrator.runOnce(ledger, checkpoints, results, {});
      const before = await checkpoints.load();
      const updateSpy = vi.spyOn(checkpoints, 'updateCheckpoint');

      const report = await orchestrator.runOnce(ledger, checkpoints, results, {});

      expect(report).toEqual({
        slice: null,
        attempted: 0,
        succeeded: 0,
        failed: 0,
        skipped: 0,
        flushes: 0,
        lastIndex: 2,
        ledgerSize: 3,
        hasMoreWork: false,
        durationMs: 0,
      });
      expect(extraction.calls).toHaveLength(3);
      expect(updateSpy).not.toHaveBeenCalled();
      expect(await checkpoints.load()).toEqual(before);
    });

    it('should treat an empty ledger as complete', async () => {
      const extraction = new FakeExtraction();

      const report = await runOnce(
        WorkLedger.fromText(''),
        new MemoryCheckpointStore(),
        new MemoryResultStore(),
        {},
        extraction,
        testOptions()
      );

      expect(report.slice).toBeNull();
      expect(report.hasMoreWork).toBe(false);
      expect(report.lastIndex).toBe(-1);
      expect(extraction.calls).toEqual([]);
    });

    it('should treat a checkpoint beyond the ledger as complete', async () => {
      const checkpoints = new MemoryCheckpointStore(
        advanceCheckpoint(createEmptyCheckpoint(), 10, [], NOW)
      );

      const report = await runOnce(
        makeLedger(5),
        checkpoints,
        new MemoryResultStore(),
        {},
        new FakeExtraction(),
        testOptions()
      );

      expect(report.slice).toBeNull();
      expect(report.lastIndex).toBe(10);
    });

    it('should not re-attempt items recorded before a crash in the flush window', async () => {
      // Outcomes 0..4 were appended, but the checkpoint update never happened
      const results = new MemoryResultStore([0, 1, 2, 3, 4].map((i) => outcome(i)));
      const checkpoints = new MemoryCheckpointStore();
      const extraction = new FakeExtraction();

      const report = await runOnce(
        makeLedger(7),
        checkpoints,
        results,
        { maxItemsPerRun: 10, flushEvery: 5 },
        extraction,
        testOptions()
      );

      expect(extraction.calls).toEqual([itemId(5), itemId(6)]);
      expect(report.skipped).toBe(5);
      expect(report.attempted).toBe(2);
      expect(await results.load()).toHaveLength(7);
      const checkpoint = await checkpoints.load();
      expect(checkpoint.lastIndex).toBe(6);
      expect(checkpoint.processedIds.size).toBe(7);
    });

    it('should attempt a duplicated identifier once', async () => {
      const ledger = WorkLedger.fromIdentifiers(['a', 'b', 'a', 'c']);
      const extraction = new FakeExtraction();
      const results = new MemoryResultStore();

      const report = await runOnce(
        ledger,
        new MemoryCheckpointStore(),
        results,
        { flushEvery: 10 },
        extraction,
        testOptions()
      );

      expect(extraction.calls).toEqual(['a', 'b', 'c']);
      expect(report.skipped).toBe(1);
      expect((await results.load()).map((o) => o.id)).toEqual(['a', 'b', 'c']);
    });
  });

  describe('failure isolation', () => {
    it('should record a thrown fault as a failed outcome and keep going', async () => {
      const extraction = new FakeExtraction(async (id) => {
        if (id === itemId(4)) {
          throw new Error('navigation crashed');
        }
        return succeeded({ url: id });
      });
      const results = new MemoryResultStore();

      const report = await runOnce(
        makeLedger(10),
        new MemoryCheckpointStore(),
        results,
        {},
        extraction,
        testOptions()
      );

      expect(report.succeeded).toBe(9);
      expect(report.failed).toBe(1);
      expect(report.lastIndex).toBe(9);
      const recorded = await results.load();
      expect(recorded).toHaveLength(10);
      expect(recorded[4]).toEqual({
        id: itemId(4),
        status: 'failed',
        payload: null,
        error: 'navigation crashed',
        recordedAt: '2026-03-01T10:00:00.000Z',
      });
    });

    it('should keep failed results as outcomes with their error', async () => {
      const extraction = new FakeExtraction(async () => ({
        status: 'failed',
        payload: { url: 'x' },
        error: 'Empty content',
      }));
      const results = new MemoryResultStore();

      await runOnce(makeLedger(1), new MemoryCheckpointStore(), results, {}, extraction, testOptions());

      const [recorded] = await results.load();
      expect(recorded?.status).toBe('failed');
      expect(recorded?.payload).toEqual({ url: 'x' });
      expect(recorded?.error).toBe('Empty content');
    });

    it('should reject a malformed extraction result', async () => {
      const malformed: ExtractionOperation = {
        extract: async () => JSON.parse('{"status":"maybe"}'),
      };
      const results = new MemoryResultStore();

      const report = await runOnce(
        makeLedger(1),
        new MemoryCheckpointStore(),
        results,
        {},
        malformed,
        testOptions()
      );

      expect(report.failed).toBe(1);
      expect((await results.load())[0]?.error).toBe('Extraction returned a malformed result');
    });

    it('should fail an item that exceeds the extraction timeout', async () => {
      let aborted = false;
      const hanging: ExtractionOperation = {
        extract: (_id, signal) => {
          return new Promise<ExtractionResult>((_, reject) => {
            signal?.addEventListener('abort', () => {
              aborted = true;
              reject(new Error('aborted'));
            });
          });
        },
      };
      const results = new MemoryResultStore();

      const report = await runOnce(
        makeLedger(1),
        new MemoryCheckpointStore(),
        results,
        { extractionTimeoutMs: 20 },
        hanging,
        testOptions()
      );

      expect(report.failed).toBe(1);
      expect(aborted).toBe(true);
      expect((await results.load())[0]?.error).toBe('Extraction timed out after 20ms');
    });

    it('should not start the next item while a timed-out extraction is still open', async () => {
      const sessions = { open: 0, peak: 0 };
      const slowFactory: PageSessionFactory = {
        open: async () => {
          sessions.open++;
          sessions.peak = Math.max(sessions.peak, sessions.open);
          let interrupt: ((error: Error) => void) | undefined;
          const session: PageSession = {
            goto: () =>
              new Promise<void>((resolve, reject) => {
                const timer = setTimeout(resolve, 200);
                interrupt = (error) => {
                  clearTimeout(timer);
                  reject(error);
                };
              }),
            waitForSelector: async () => true,
            title: async () => '',
            content: async () => '',
            textOf: async () => 'text',
            close: async () => {
              sessions.open--;
              interrupt?.(new Error('Target page has been closed'));
            },
          };
          return session;
        },
      };
      const results = new MemoryResultStore();

      const report = await runOnce(
        makeLedger(3),
        new MemoryCheckpointStore(),
        results,
        { extractionTimeoutMs: 50 },
        new PageExtractor(slowFactory),
        testOptions()
      );

      expect(report.failed).toBe(3);
      expect(sessions.peak).toBe(1);
      expect(sessions.open).toBe(0);
      expect((await results.load()).map((o) => o.error)).toEqual([
        'Extraction timed out after 50ms',
        'Extraction timed out after 50ms',
        'Extraction timed out after 50ms',
      ]);
    });
  });

  describe('pacing', () => {
    it('should wait between attempted items but not after the last', async () => {
      const sleep = vi.fn(async (_ms: number) => {});

      await runOnce(
        makeLedger(4),
        new MemoryCheckpointStore(),
        new MemoryResultStore(),
        { interItemDelayMs: 250 },
        new FakeExtraction(),
        testOptions({ sleep })
      );

      expect(sleep.mock.calls).toEqual([[250], [250], [250]]);
    });

    it('should not wait after skipped items', async () => {
      const sleep = vi.fn(async (_ms: number) => {});

      await runOnce(
        WorkLedger.fromIdentifiers(['a', 'b', 'a']),
        new MemoryCheckpointStore(),
        new MemoryResultStore(),
        { interItemDelayMs: 250 },
        new FakeExtraction(),
        testOptions({ sleep })
      );

      expect(sleep).toHaveBeenCalledTimes(2);
    });
  });

  describe('events', () => {
    it('should report item progress in order', async () => {
      const events: string[] = [];
      const results = new MemoryResultStore([outcome(1)]);

      await runOnce(
        makeLedger(3),
        new MemoryCheckpointStore(),
        results,
        { flushEvery: 10 },
        new FakeExtraction(),
        testOptions({
          events: {
            onItemStart: (item) => events.push(`start ${item.index}`),
            onItemComplete: (item, result) => events.push(`done ${item.index} ${result.status}`),
            onItemSkipped: (item) => events.push(`skip ${item.index}`),
            onFlush: (event) => events.push(`flush ${event.lastIndex}`),
          },
        })
      );

      expect(events).toEqual([
        'start 0',
        'done 0 succeeded',
        'skip 1',
        'start 2',
        'done 2 succeeded',
        'flush 2',
      ]);
    });
  });

  describe('persistence failures', () => {
    it('should abort when outcomes cannot be appended', async () => {
      const checkpoints = new MemoryCheckpointStore();
      const results = new FlakyResultStore(2);

      const error: unknown = await runOnce(
        makeLedger(5),
        checkpoints,
        results,
        { flushEvery: 2 },
        new FakeExtraction(),
        testOptions()
      ).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RunAbortedError);
      if (isRunAbortedError(error)) {
        expect(error.code).toBe(RunErrorCode.RESULT_APPEND_FAILED);
        expect(error.lastDurableIndex).toBe(1);
        expect(error.cause?.message).toBe('disk full');
      }
      expect((await checkpoints.load()).lastIndex).toBe(1);
      expect(await results.load()).toHaveLength(2);
    });

    it('should abort when the checkpoint cannot be replaced, and resume safely', async () => {
      const ledger = makeLedger(4);
      const checkpoints = new FlakyCheckpointStore();
      const results = new MemoryResultStore();
      checkpoints.failUpdates = true;

      await expect(
        runOnce(ledger, checkpoints, results, { flushEvery: 2 }, new FakeExtraction(), testOptions())
      ).rejects.toMatchObject({
        code: RunErrorCode.CHECKPOINT_UPDATE_FAILED,
        lastDurableIndex: -1,
      });
      expect(await results.load()).toHaveLength(2);
      expect((await checkpoints.load()).lastIndex).toBe(-1);

      checkpoints.failUpdates = false;
      const extraction = new FakeExtraction();
      const report = await runOnce(ledger, checkpoints, results, { flushEvery: 2 }, extraction, testOptions());

      expect(extraction.calls).toEqual([itemId(2), itemId(3)]);
      expect(report.skipped).toBe(2);
      expect((await checkpoints.load()).processedIds.size).toBe(4);
    });

    it('should abort when progress state cannot be loaded', async () => {
      const checkpoints = new FlakyCheckpointStore();
      checkpoints.failLoad = true;

      await expect(
        runOnce(makeLedger(2), checkpoints, new MemoryResultStore(), {}, new FakeExtraction(), testOptions())
      ).rejects.toMatchObject({
        code: RunErrorCode.LOAD_FAILED,
        lastDurableIndex: null,
      });
    });
  });

  describe('configuration', () => {
    it('should reject an invalid run configuration', async () => {
      await expect(
        runOnce(
          makeLedger(2),
          new MemoryCheckpointStore(),
          new MemoryResultStore(),
          { maxItemsPerRun: 0 },
          new FakeExtraction(),
          testOptions()
        )
      ).rejects.toThrow();
    });
  });
});
